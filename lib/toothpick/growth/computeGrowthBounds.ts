import type { GrowthBounds } from "../../types/toothpick-types"
import { getToothpickEndpoints } from "../toothpick"
import type { GrowthState } from "./types"

/** Returned when there is nothing to measure */
export const EMPTY_GROWTH_BOUNDS: GrowthBounds = {
  minX: -100,
  maxX: 100,
  minY: -100,
  maxY: 100,
}

/**
 * Axis-aligned box around every endpoint of every toothpick.
 */
export function computeGrowthBounds(state: GrowthState): GrowthBounds {
  if (state.toothpicks.length === 0) {
    return { ...EMPTY_GROWTH_BOUNDS }
  }

  let minX = Infinity
  let maxX = -Infinity
  let minY = Infinity
  let maxY = -Infinity

  for (const toothpick of state.toothpicks) {
    for (const { x, y } of getToothpickEndpoints(toothpick)) {
      minX = Math.min(minX, x)
      maxX = Math.max(maxX, x)
      minY = Math.min(minY, y)
      maxY = Math.max(maxY, y)
    }
  }

  return { minX, maxX, minY, maxY }
}
