export * from "./types/toothpick-types"
export * from "./toothpick/toothpick"
export * from "./toothpick/getPointKey"
export * from "./data-structures/EndpointIndex"
export type {
  GrowthSite,
  GrowthState,
  StepGrowthOptions,
} from "./toothpick/growth/types"
export {
  initGrowthState,
  resetGrowthState,
} from "./toothpick/growth/initGrowthState"
export { stepGrowth } from "./toothpick/growth/stepGrowth"
export { findGrowthSites } from "./toothpick/growth/findGrowthSites"
export {
  computeGrowthBounds,
  EMPTY_GROWTH_BOUNDS,
} from "./toothpick/growth/computeGrowthBounds"
export {
  getGeneration,
  getToothpickCount,
  isEndpointUsed,
} from "./toothpick/growth/accessors"
export { growToGeneration } from "./toothpick/growth/growToGeneration"
export * from "./solvers/ToothpickGrowthSolver"
export * from "./driver/ToothpickGrowthDriver"
export type {
  ViewportOptions,
  ViewportTransform,
} from "./viewport/types"
export {
  computeViewportTransform,
  getStaticViewportTransform,
} from "./viewport/computeViewportTransform"
export { easeViewportTransform } from "./viewport/easeViewportTransform"
export { projectToViewport } from "./viewport/projectToViewport"
export { parseToothpickGrowthConfig } from "./config/parseToothpickGrowthConfig"
export {
  TOOTHPICK_GROWTH_CONFIG,
  type ToothpickGrowthConfig,
} from "../toothpick-growth.config"
