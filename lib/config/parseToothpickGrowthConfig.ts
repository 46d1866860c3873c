import {
  TOOTHPICK_GROWTH_CONFIG,
  type ToothpickGrowthConfig,
} from "../../toothpick-growth.config"

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function invalid(key: string, expected: string, value: unknown): Error {
  return new Error(
    `INVALID CONFIG: "${key}" must be ${expected}, got ${JSON.stringify(value)}`,
  )
}

function readNumber(
  raw: Record<string, unknown>,
  key: string,
  /** `null` marks a required key */
  fallback: number | null,
  params: { expected: string; isValid: (value: number) => boolean },
): number {
  const value = raw[key]
  if (value === undefined) {
    if (fallback === null) {
      throw new Error(`INVALID CONFIG: "${key}" is required`)
    }
    return fallback
  }
  if (typeof value !== "number" || !params.isValid(value)) {
    throw invalid(key, params.expected, value)
  }
  return value
}

const positiveFinite = {
  expected: "a positive finite number",
  isValid: (value: number) => Number.isFinite(value) && value > 0,
}

const nonNegativeInteger = {
  expected: "a non-negative integer",
  isValid: (value: number) => Number.isInteger(value) && value >= 0,
}

/**
 * Turns a raw config object (as read from a `config.json`) into a
 * `ToothpickGrowthConfig`. Keys are the snake_case names used by config
 * files; styling keys such as colors, thickness and fps are ignored.
 * Throws on the first invalid or missing required key.
 */
export function parseToothpickGrowthConfig(
  raw: unknown,
): ToothpickGrowthConfig {
  if (!isRecord(raw)) {
    throw new Error(
      `INVALID CONFIG: expected an object, got ${JSON.stringify(raw)}`,
    )
  }

  const defaults = TOOTHPICK_GROWTH_CONFIG

  const autoZoomEnabled = raw.auto_zoom_enabled ?? defaults.autoZoomEnabled
  if (typeof autoZoomEnabled !== "boolean") {
    throw invalid("auto_zoom_enabled", "a boolean", autoZoomEnabled)
  }

  return {
    toothpickLength: readNumber(raw, "toothpick_length", null, positiveFinite),
    maxGenerations: readNumber(
      raw,
      "max_generations",
      defaults.maxGenerations,
      nonNegativeInteger,
    ),
    generationDelay: readNumber(
      raw,
      "generation_delay",
      defaults.generationDelay,
      nonNegativeInteger,
    ),
    viewport: {
      width: readNumber(
        raw,
        "window_width",
        defaults.viewport.width,
        positiveFinite,
      ),
      height: readNumber(
        raw,
        "window_height",
        defaults.viewport.height,
        positiveFinite,
      ),
      padding: readNumber(raw, "zoom_padding", defaults.viewport.padding, {
        expected: "a non-negative finite number",
        isValid: (value) => Number.isFinite(value) && value >= 0,
      }),
    },
    zoomSpeed: readNumber(raw, "zoom_speed", defaults.zoomSpeed, {
      expected: "a number in [0, 1]",
      isValid: (value) => value >= 0 && value <= 1,
    }),
    autoZoomEnabled,
  }
}
