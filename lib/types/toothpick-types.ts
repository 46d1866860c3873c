export type Point = { x: number; y: number }

/** Map key for a point, `"x,y"` */
export type PointKey = string

export type ToothpickOrientation = "horizontal" | "vertical"

export interface Toothpick {
  readonly x: number
  readonly y: number
  readonly length: number
  readonly orientation: ToothpickOrientation
}

export type GrowthBounds = {
  minX: number
  maxX: number
  minY: number
  maxY: number
}
