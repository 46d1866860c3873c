import type { Point } from "../types/toothpick-types"
import type { ViewportOptions, ViewportTransform } from "./types"

/**
 * World point to screen point. The transform's center lands in the middle
 * of the viewport.
 */
export function projectToViewport(
  point: Point,
  transform: ViewportTransform,
  viewport: Pick<ViewportOptions, "width" | "height">,
): Point {
  const offsetX = transform.centerX - viewport.width / (2 * transform.scale)
  const offsetY = transform.centerY - viewport.height / (2 * transform.scale)

  return {
    x: (point.x - offsetX) * transform.scale,
    y: (point.y - offsetY) * transform.scale,
  }
}
