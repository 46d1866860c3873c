import type { Point, PointKey, Toothpick } from "../types/toothpick-types"
import { getPointKey } from "../toothpick/getPointKey"
import { getToothpickEndpoints } from "../toothpick/toothpick"

export interface IEndpointIndex {
  getTouchingCount(point: Point): number
}

/**
 * Counts, for every endpoint coordinate, how many toothpicks end there.
 * Built once per generation and never modified afterwards.
 */
export class EndpointIndex implements IEndpointIndex {
  private counts = new Map<PointKey, number>()

  constructor(toothpicks: readonly Toothpick[]) {
    for (const toothpick of toothpicks) {
      for (const endpoint of getToothpickEndpoints(toothpick)) {
        const key = getPointKey(endpoint)
        this.counts.set(key, (this.counts.get(key) ?? 0) + 1)
      }
    }
  }

  getTouchingCount(point: Point): number {
    return this.counts.get(getPointKey(point)) ?? 0
  }

  /** Number of distinct endpoint coordinates */
  get size(): number {
    return this.counts.size
  }
}

export function buildEndpointIndex(
  toothpicks: readonly Toothpick[],
): EndpointIndex {
  return new EndpointIndex(toothpicks)
}
