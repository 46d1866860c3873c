import type { IEndpointIndex } from "../../lib/data-structures/EndpointIndex"
import { getToothpickEndpoints } from "../../lib/toothpick/toothpick"
import type { Point, Toothpick } from "../../lib/types/toothpick-types"

/**
 * Reference touching count: scans every toothpick on every query.
 */
export class ScanEndpointIndex implements IEndpointIndex {
  constructor(private toothpicks: readonly Toothpick[]) {}

  getTouchingCount(point: Point): number {
    let count = 0
    for (const toothpick of this.toothpicks) {
      const endpoints = getToothpickEndpoints(toothpick)
      if (endpoints.some((e) => e.x === point.x && e.y === point.y)) {
        count++
      }
    }
    return count
  }
}

export const buildScanEndpointIndex = (toothpicks: readonly Toothpick[]) =>
  new ScanEndpointIndex(toothpicks)
