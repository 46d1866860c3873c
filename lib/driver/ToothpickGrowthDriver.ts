import type { ToothpickGrowthConfig } from "../../toothpick-growth.config"
import { ToothpickGrowthSolver } from "../solvers/ToothpickGrowthSolver"
import { computeGrowthBounds } from "../toothpick/growth/computeGrowthBounds"
import {
  computeViewportTransform,
  getStaticViewportTransform,
} from "../viewport/computeViewportTransform"
import { easeViewportTransform } from "../viewport/easeViewportTransform"
import type { ViewportTransform } from "../viewport/types"

export type GrowthCommand = "step" | "reset" | "quit"

/**
 * Runs the growth the way an interactive window would: a generation is
 * grown automatically every `generationDelay` ticks, the user can grow or
 * reset on demand, and the camera eases toward the grown shape.
 *
 * Nothing here draws; a renderer reads `solver.visualize()` or the
 * solver output together with `camera` after each tick.
 */
export class ToothpickGrowthDriver {
  readonly solver: ToothpickGrowthSolver
  private config: ToothpickGrowthConfig
  private frameCounter = 0
  private running = true
  private camera: ViewportTransform | null = null

  constructor(config: ToothpickGrowthConfig) {
    this.config = config
    this.solver = new ToothpickGrowthSolver({
      toothpickLength: config.toothpickLength,
      maxGenerations: config.maxGenerations,
    })
    this.solver.setup()
  }

  get isRunning(): boolean {
    return this.running
  }

  /** Current camera, or `null` before the first tick */
  get cameraTransform(): ViewportTransform | null {
    return this.camera
  }

  private canGrow(): boolean {
    return this.solver.getGrowthState().generation < this.config.maxGenerations
  }

  /** One frame of the loop: maybe grow, then move the camera */
  tick() {
    if (!this.running) return

    if (this.canGrow()) {
      this.frameCounter++
      if (this.frameCounter >= this.config.generationDelay) {
        this.solver.step()
        this.frameCounter = 0
      }
    }

    this.updateCamera()
  }

  handleCommand(command: GrowthCommand) {
    if (!this.running) return

    switch (command) {
      case "step":
        if (this.canGrow()) {
          this.solver.step()
        }
        break
      case "reset":
        this.solver.reset()
        this.frameCounter = 0
        break
      case "quit":
        this.running = false
        break
    }
  }

  getStatusText(): string {
    const state = this.solver.getGrowthState()
    return `Generation: ${state.generation} | Toothpicks: ${state.toothpicks.length}`
  }

  private updateCamera() {
    if (!this.config.autoZoomEnabled) {
      this.camera = getStaticViewportTransform()
      return
    }

    const target = computeViewportTransform(
      computeGrowthBounds(this.solver.getGrowthState()),
      this.config.viewport,
    )
    this.camera = easeViewportTransform(
      this.camera,
      target,
      this.config.zoomSpeed,
    )
  }
}
