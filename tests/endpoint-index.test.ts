import { expect, test } from "vitest"
import {
  buildEndpointIndex,
  EndpointIndex,
} from "../lib/data-structures/EndpointIndex"
import { createToothpick } from "../lib/toothpick/toothpick"

const seed = createToothpick({ x: 0, y: 0, length: 2, orientation: "vertical" })
const top = createToothpick({
  x: 0,
  y: 1,
  length: 2,
  orientation: "horizontal",
})
const topLeft = createToothpick({
  x: -1,
  y: 2,
  length: 2,
  orientation: "vertical",
})
const upperLeft = createToothpick({
  x: -1,
  y: 0,
  length: 2,
  orientation: "vertical",
})

test("counts every toothpick ending at a point", () => {
  const index = buildEndpointIndex([seed, top, topLeft, upperLeft])

  expect(index).toBeInstanceOf(EndpointIndex)
  // (-1,1) is the left end of `top`, the bottom of `topLeft` and the top of `upperLeft`
  expect(index.getTouchingCount({ x: -1, y: 1 })).toBe(3)
  expect(index.getTouchingCount({ x: 0, y: -1 })).toBe(1)
  expect(index.getTouchingCount({ x: 1, y: 1 })).toBe(1)
})

test("a toothpick center is not an endpoint", () => {
  const index = buildEndpointIndex([seed, top])

  expect(index.getTouchingCount({ x: 0, y: 1 })).toBe(1)
  expect(index.getTouchingCount({ x: 0, y: 0 })).toBe(0)
})

test("absent points report zero", () => {
  const index = buildEndpointIndex([seed])

  expect(index.getTouchingCount({ x: 42, y: 42 })).toBe(0)
  expect(buildEndpointIndex([]).size).toBe(0)
})

test("size is the number of distinct endpoint coordinates", () => {
  expect(buildEndpointIndex([seed]).size).toBe(2)
  expect(buildEndpointIndex([seed, top]).size).toBe(4)
  expect(buildEndpointIndex([seed, top, topLeft, upperLeft]).size).toBe(6)
})
