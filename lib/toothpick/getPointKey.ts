import type { Point, PointKey } from "../types/toothpick-types"

/**
 * Key a point by its coordinates. `-0` and `0` produce the same key, so two
 * points share a key exactly when their coordinates compare equal.
 */
export function getPointKey(point: Point): PointKey {
  return `${point.x},${point.y}`
}
