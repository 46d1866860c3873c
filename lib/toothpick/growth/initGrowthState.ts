import { createToothpick } from "../toothpick"
import type { GrowthState } from "./types"

/**
 * Seed state: a single vertical toothpick centered on the origin.
 */
export function initGrowthState(toothpickLength: number): GrowthState {
  return {
    toothpickLength,
    toothpicks: [
      createToothpick({
        x: 0,
        y: 0,
        length: toothpickLength,
        orientation: "vertical",
      }),
    ],
    generation: 0,
    usedEndpoints: new Set(),
  }
}

/**
 * Discards whatever was grown and starts again from the seed.
 */
export function resetGrowthState(toothpickLength: number): GrowthState {
  return initGrowthState(toothpickLength)
}
