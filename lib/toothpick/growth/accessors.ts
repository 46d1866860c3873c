import type { Point } from "../../types/toothpick-types"
import { getPointKey } from "../getPointKey"
import type { GrowthState } from "./types"

export const getToothpickCount = (state: GrowthState): number =>
  state.toothpicks.length

export const getGeneration = (state: GrowthState): number => state.generation

export const isEndpointUsed = (state: GrowthState, point: Point): boolean =>
  state.usedEndpoints.has(getPointKey(point))
