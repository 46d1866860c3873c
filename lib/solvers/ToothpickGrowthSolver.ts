// lib/solvers/ToothpickGrowthSolver.ts
import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import type { GrowthBounds, Toothpick } from "../types/toothpick-types"
import type { GrowthState, StepGrowthOptions } from "../toothpick/growth/types"
import {
  initGrowthState,
  resetGrowthState,
} from "../toothpick/growth/initGrowthState"
import { stepGrowth } from "../toothpick/growth/stepGrowth"
import { findGrowthSites } from "../toothpick/growth/findGrowthSites"
import { computeGrowthBounds } from "../toothpick/growth/computeGrowthBounds"
import { buildEndpointIndex } from "../data-structures/EndpointIndex"
import { getToothpickEndpoints } from "../toothpick/toothpick"

const COLOR_MAP = {
  toothpickStroke: "#374151",
  newestToothpickStroke: "#f59e0b",
  growthSite: "#10b981",
  boundsStroke: "#9ca3af",
}

export interface ToothpickGrowthSolverInput {
  toothpickLength: number
  /** The solver stops once this many generations have been grown */
  maxGenerations: number
  stepOptions?: StepGrowthOptions
}

/**
 * Grows the toothpick fractal one generation per step.
 *
 * Each step:
 * 1. Counts how many toothpicks end at every endpoint
 * 2. Spawns a perpendicular toothpick on each endpoint touched exactly once
 *    that has never spawned before
 * 3. Commits the whole generation at once
 *
 * The solver is solved when `maxGenerations` is reached. `reset()` returns
 * to the seed toothpick so the growth can be replayed.
 */
export class ToothpickGrowthSolver extends BaseSolver {
  private input: ToothpickGrowthSolverInput
  private state: GrowthState
  /** Number of toothpicks that existed before the latest generation */
  private previousToothpickCount = 0

  constructor(input: ToothpickGrowthSolverInput) {
    super()
    this.input = input
    this.state = initGrowthState(input.toothpickLength)
  }

  override _setup() {
    this.updateStats()
  }

  /** Exactly ONE generation per call */
  override _step() {
    if (this.state.generation >= this.input.maxGenerations) {
      this.solved = true
      return
    }

    this.previousToothpickCount = this.state.toothpicks.length
    this.state = stepGrowth(this.state, this.input.stepOptions)
    this.updateStats()

    if (this.state.generation >= this.input.maxGenerations) {
      this.solved = true
    }
  }

  /** Back to the seed toothpick, ready to grow again */
  reset() {
    this.state = resetGrowthState(this.input.toothpickLength)
    this.previousToothpickCount = 0
    this.solved = false
    this.failed = false
    this.error = null
    this.iterations = 0
    this.updateStats()
  }

  getGrowthState(): GrowthState {
    return this.state
  }

  /** Compute solver progress (0 to 1) */
  computeProgress(): number {
    if (this.solved || this.input.maxGenerations <= 0) {
      return 1
    }
    return Math.min(1, this.state.generation / this.input.maxGenerations)
  }

  override getOutput(): {
    toothpicks: readonly Toothpick[]
    generation: number
    bounds: GrowthBounds
  } {
    return {
      toothpicks: this.state.toothpicks,
      generation: this.state.generation,
      bounds: computeGrowthBounds(this.state),
    }
  }

  private updateStats() {
    const index = buildEndpointIndex(this.state.toothpicks)
    this.stats = {
      generation: this.state.generation,
      toothpickCount: this.state.toothpicks.length,
      usedEndpointCount: this.state.usedEndpoints.size,
      growthSiteCount: findGrowthSites(this.state, index).length,
    }
  }

  /** Toothpicks, the newest generation highlighted, and next growth sites */
  override visualize(): GraphicsObject {
    const lines: NonNullable<GraphicsObject["lines"]> = []
    const points: NonNullable<GraphicsObject["points"]> = []
    const rects: NonNullable<GraphicsObject["rects"]> = []

    const bounds = computeGrowthBounds(this.state)
    rects.push({
      center: {
        x: (bounds.minX + bounds.maxX) / 2,
        y: (bounds.minY + bounds.maxY) / 2,
      },
      width: bounds.maxX - bounds.minX,
      height: bounds.maxY - bounds.minY,
      fill: "none",
      stroke: COLOR_MAP.boundsStroke,
      label: "bounds",
    })

    const strokeWidth = this.state.toothpickLength * 0.05
    this.state.toothpicks.forEach((toothpick, i) => {
      const isNewest =
        this.state.generation > 0 && i >= this.previousToothpickCount
      lines.push({
        points: getToothpickEndpoints(toothpick),
        strokeColor: isNewest
          ? COLOR_MAP.newestToothpickStroke
          : COLOR_MAP.toothpickStroke,
        strokeWidth,
        label: `toothpick ${i} (${toothpick.orientation})`,
      })
    })

    const index = buildEndpointIndex(this.state.toothpicks)
    for (const { endpoint } of findGrowthSites(this.state, index)) {
      points.push({
        x: endpoint.x,
        y: endpoint.y,
        color: COLOR_MAP.growthSite,
        label: "growth site",
      })
    }

    return {
      title: `ToothpickGrowth - Generation ${this.state.generation} (${this.state.toothpicks.length} toothpicks)`,
      coordinateSystem: "cartesian",
      lines,
      points,
      rects,
    }
  }
}
