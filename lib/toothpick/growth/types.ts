import type { IEndpointIndex } from "../../data-structures/EndpointIndex"
import type { Point, PointKey, Toothpick } from "../../types/toothpick-types"

export interface GrowthState {
  // Static configuration
  readonly toothpickLength: number

  // Dynamic state
  readonly toothpicks: readonly Toothpick[] // creation order
  readonly generation: number
  readonly usedEndpoints: ReadonlySet<PointKey> // endpoints that already spawned
}

/** A free endpoint together with the toothpick it belongs to */
export interface GrowthSite {
  endpoint: Point
  parent: Toothpick
}

export interface StepGrowthOptions {
  /**
   * Builds the touching-count lookup for a generation. Defaults to
   * `buildEndpointIndex`; any replacement must report the same counts.
   */
  buildIndex?: (toothpicks: readonly Toothpick[]) => IEndpointIndex
}
