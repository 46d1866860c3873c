import type {
  Point,
  Toothpick,
  ToothpickOrientation,
} from "../types/toothpick-types"

export function createToothpick(params: {
  x: number
  y: number
  length: number
  orientation: ToothpickOrientation
}): Toothpick {
  return Object.freeze({
    x: params.x,
    y: params.y,
    length: params.length,
    orientation: params.orientation,
  })
}

/**
 * Returns the two endpoints, negative side first.
 */
export function getToothpickEndpoints(toothpick: Toothpick): [Point, Point] {
  const halfLength = toothpick.length / 2

  if (toothpick.orientation === "horizontal") {
    return [
      { x: toothpick.x - halfLength, y: toothpick.y },
      { x: toothpick.x + halfLength, y: toothpick.y },
    ]
  }

  return [
    { x: toothpick.x, y: toothpick.y - halfLength },
    { x: toothpick.x, y: toothpick.y + halfLength },
  ]
}

/**
 * Identity key of a toothpick. Length is a run-wide constant and is left
 * out, so two toothpicks at the same center with the same orientation share
 * a key whatever their lengths.
 */
export function getToothpickKey(toothpick: Toothpick): string {
  return `${toothpick.x},${toothpick.y},${toothpick.orientation}`
}

export function toothpicksEqual(a: Toothpick, b: Toothpick): boolean {
  return a.x === b.x && a.y === b.y && a.orientation === b.orientation
}

export function flipOrientation(
  orientation: ToothpickOrientation,
): ToothpickOrientation {
  return orientation === "horizontal" ? "vertical" : "horizontal"
}
