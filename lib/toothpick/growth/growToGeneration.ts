import { stepGrowth } from "./stepGrowth"
import type { GrowthState, StepGrowthOptions } from "./types"

/**
 * Step until `targetGeneration` is reached
 */
export function growToGeneration(
  state: GrowthState,
  targetGeneration: number,
  options: StepGrowthOptions = {},
): GrowthState {
  let current = state
  while (current.generation < targetGeneration) {
    current = stepGrowth(current, options)
  }
  return current
}
