import type { GrowthBounds } from "../types/toothpick-types"
import type { ViewportOptions, ViewportTransform } from "./types"

/**
 * Fit the bounds inside the padded viewport, keeping the aspect ratio.
 * Spans below 1 world unit are treated as 1 so a single point doesn't
 * zoom in infinitely.
 */
export function computeViewportTransform(
  bounds: GrowthBounds,
  viewport: ViewportOptions,
): ViewportTransform {
  const spanX = bounds.maxX - bounds.minX
  const spanY = bounds.maxY - bounds.minY

  const scaleX = (viewport.width - 2 * viewport.padding) / Math.max(spanX, 1)
  const scaleY = (viewport.height - 2 * viewport.padding) / Math.max(spanY, 1)

  return {
    centerX: (bounds.minX + bounds.maxX) / 2,
    centerY: (bounds.minY + bounds.maxY) / 2,
    scale: Math.min(scaleX, scaleY),
  }
}

/** Unzoomed view with the world origin in the middle of the viewport */
export function getStaticViewportTransform(): ViewportTransform {
  return { centerX: 0, centerY: 0, scale: 1 }
}
