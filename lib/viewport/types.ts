export interface ViewportOptions {
  width: number
  height: number
  /** Screen-space margin kept free on every side when fitting */
  padding: number
}

/** World-space center shown in the middle of the viewport, and zoom */
export interface ViewportTransform {
  centerX: number
  centerY: number
  scale: number
}
