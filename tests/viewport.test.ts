import { expect, test } from "vitest"
import {
  computeViewportTransform,
  getStaticViewportTransform,
} from "../lib/viewport/computeViewportTransform"
import { easeViewportTransform } from "../lib/viewport/easeViewportTransform"
import { projectToViewport } from "../lib/viewport/projectToViewport"

const viewport = { width: 200, height: 100, padding: 10 }

test("fits the bounds using the tighter axis", () => {
  const transform = computeViewportTransform(
    { minX: -10, maxX: 30, minY: 0, maxY: 10 },
    viewport,
  )

  // x: 180 / 40 = 4.5, y: 80 / 10 = 8
  expect(transform).toEqual({ centerX: 10, centerY: 5, scale: 4.5 })
})

test("spans below one unit are treated as one", () => {
  const transform = computeViewportTransform(
    { minX: 3, maxX: 3, minY: -2, maxY: -2 },
    viewport,
  )

  expect(transform).toEqual({ centerX: 3, centerY: -2, scale: 80 })
})

test("easing snaps on the first frame", () => {
  const target = { centerX: 1, centerY: 2, scale: 3 }

  const eased = easeViewportTransform(null, target, 0.1)

  expect(eased).toEqual(target)
  expect(eased).not.toBe(target)
})

test("easing covers zoomSpeed of the remaining distance", () => {
  const eased = easeViewportTransform(
    { centerX: 0, centerY: 0, scale: 1 },
    { centerX: 10, centerY: -10, scale: 3 },
    0.25,
  )

  expect(eased).toEqual({ centerX: 2.5, centerY: -2.5, scale: 1.5 })
})

test("projects the transform center to the middle of the viewport", () => {
  const transform = { centerX: 10, centerY: 5, scale: 2 }

  expect(projectToViewport({ x: 10, y: 5 }, transform, viewport)).toEqual({
    x: 100,
    y: 50,
  })
  expect(projectToViewport({ x: 0, y: 0 }, transform, viewport)).toEqual({
    x: 80,
    y: 40,
  })
})

test("the static transform puts the origin in the middle, unscaled", () => {
  const transform = getStaticViewportTransform()

  expect(projectToViewport({ x: 0, y: 0 }, transform, viewport)).toEqual({
    x: 100,
    y: 50,
  })
  expect(projectToViewport({ x: -5, y: 7 }, transform, viewport)).toEqual({
    x: 95,
    y: 57,
  })
})
