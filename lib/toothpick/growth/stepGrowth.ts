import { buildEndpointIndex } from "../../data-structures/EndpointIndex"
import type { PointKey, Toothpick } from "../../types/toothpick-types"
import { getPointKey } from "../getPointKey"
import {
  createToothpick,
  flipOrientation,
  getToothpickKey,
} from "../toothpick"
import { findGrowthSites } from "./findGrowthSites"
import type { GrowthState, StepGrowthOptions } from "./types"

/**
 * Advance the growth by exactly one generation.
 *
 * Every free endpoint spawns a toothpick centered on it, perpendicular to
 * its parent. An endpoint is marked used the moment it spawns and stays
 * excluded for the rest of the run, even if its touching count later drops
 * back to 1. A candidate equal to an existing toothpick, or to one already
 * spawned this generation, is dropped and its endpoint is left unmarked.
 *
 * The input state is not modified. When nothing can grow, the returned
 * state differs from the input only by its generation.
 */
export function stepGrowth(
  state: GrowthState,
  options: StepGrowthOptions = {},
): GrowthState {
  const buildIndex = options.buildIndex ?? buildEndpointIndex
  const index = buildIndex(state.toothpicks)

  const usedEndpoints = new Set<PointKey>(state.usedEndpoints)
  const toothpickKeys = new Set(state.toothpicks.map(getToothpickKey))
  const newToothpicks: Toothpick[] = []

  for (const { endpoint, parent } of findGrowthSites(state, index)) {
    const endpointKey = getPointKey(endpoint)
    // An endpoint spawns at most once, even within a generation
    if (usedEndpoints.has(endpointKey)) continue

    const candidate = createToothpick({
      x: endpoint.x,
      y: endpoint.y,
      length: state.toothpickLength,
      orientation: flipOrientation(parent.orientation),
    })

    const candidateKey = getToothpickKey(candidate)
    if (toothpickKeys.has(candidateKey)) continue

    toothpickKeys.add(candidateKey)
    newToothpicks.push(candidate)
    usedEndpoints.add(endpointKey)
  }

  return {
    toothpickLength: state.toothpickLength,
    toothpicks: [...state.toothpicks, ...newToothpicks],
    generation: state.generation + 1,
    usedEndpoints,
  }
}
