import type { ViewportTransform } from "./types"

/**
 * Move the camera a fraction of the way toward `target`. The first frame
 * (no current transform) snaps straight to the target.
 */
export function easeViewportTransform(
  current: ViewportTransform | null,
  target: ViewportTransform,
  zoomSpeed: number,
): ViewportTransform {
  if (!current) return { ...target }

  return {
    centerX: current.centerX + (target.centerX - current.centerX) * zoomSpeed,
    centerY: current.centerY + (target.centerY - current.centerY) * zoomSpeed,
    scale: current.scale + (target.scale - current.scale) * zoomSpeed,
  }
}
