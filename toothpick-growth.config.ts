// toothpick-growth.config.ts
import type { ViewportOptions } from "./lib/viewport/types"

export interface ToothpickGrowthConfig {
  toothpickLength: number
  maxGenerations: number
  /** Ticks between two automatic generations */
  generationDelay: number
  viewport: ViewportOptions
  /** Fraction of the remaining distance the camera covers per tick */
  zoomSpeed: number
  autoZoomEnabled: boolean
}

/**
 * Default configuration, used for every key a config file leaves out.
 * `toothpickLength` is the only key a config file must provide.
 */
export const TOOTHPICK_GROWTH_CONFIG: ToothpickGrowthConfig = {
  toothpickLength: 20,
  /**
   * Toothpick count grows roughly quadratically with the generation, so
   * each extra generation costs more than the last.
   */
  maxGenerations: 50,
  generationDelay: 30,
  viewport: {
    width: 1200,
    height: 800,
    padding: 50,
  },
  zoomSpeed: 0.1,
  autoZoomEnabled: true,
}
