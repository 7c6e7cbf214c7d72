/**
 * Built-in Scientific Ramps
 * Continuous HSV and gray ramps addressed by name
 */

import { fromHsv, fromRgb } from "../../../core/utils/color";
import { clamp, lerp } from "../../../core/utils/math";
import type { BuiltinRampName, ContinuousColorFunction } from "../core/types";

// ============================================================================
// Ramps
// ============================================================================

/**
 * Full-saturation hue sweep from red to magenta
 */
function rainbow(t: number): string {
  return fromHsv(t * (5 / 6), 1, 1);
}

/**
 * Red -> yellow over the first three quarters, then yellow fading to near white
 */
function heat(t: number): string {
  if (t <= 0.75) {
    return fromHsv((t / 0.75) * (1 / 6), 1, 1);
  }
  const u = (t - 0.75) / 0.25;
  return fromHsv(1 / 6, lerp(1, 1 / 8, u), 1);
}

/**
 * Green lowlands -> tan hills -> near-white peaks
 */
function terrain(t: number): string {
  if (t <= 0.5) {
    const u = t / 0.5;
    return fromHsv(lerp(4 / 12, 2 / 12, u), 1, lerp(0.65, 0.9, u));
  }
  const u = (t - 0.5) / 0.5;
  return fromHsv(lerp(2 / 12, 0, u), lerp(1, 0, u), lerp(0.9, 0.95, u));
}

/**
 * Deep blue -> cyan, green -> yellow-green, then pale tan
 * Segments join discontinuously, like a topographic legend.
 */
function topo(t: number): string {
  if (t <= 1 / 3) {
    return fromHsv(lerp(43 / 60, 31 / 60, t * 3), 1, 1);
  }
  if (t <= 2 / 3) {
    return fromHsv(lerp(23 / 60, 11 / 60, (t - 1 / 3) * 3), 1, 1);
  }
  const u = (t - 2 / 3) * 3;
  return fromHsv(lerp(10 / 60, 6 / 60, u), lerp(1, 0.3, u), 1);
}

/**
 * Cyan -> white -> magenta
 */
function cm(t: number): string {
  if (t <= 0.5) {
    return fromHsv(6 / 12, 0.5 * (1 - 2 * t), 1);
  }
  return fromHsv(10 / 12, 0.5 * (2 * t - 1), 1);
}

const GRAY_START = 0.3;
const GRAY_END = 0.9;
const GRAY_GAMMA = 2.2;

/**
 * Gamma-corrected gray from dark to light
 */
function gray(t: number): string {
  const start = Math.pow(GRAY_START, GRAY_GAMMA);
  const end = Math.pow(GRAY_END, GRAY_GAMMA);
  const level = Math.pow(lerp(start, end, t), 1 / GRAY_GAMMA) * 255;
  return fromRgb(level, level, level);
}

const RAMPS: Record<BuiltinRampName, ContinuousColorFunction> = {
  rainbow,
  heat,
  terrain,
  topo,
  cm,
  gray,
};

// ============================================================================
// Lookup
// ============================================================================

/**
 * Continuous function for a built-in ramp; t is clamped to [0, 1]
 */
export function builtinRamp(name: BuiltinRampName): ContinuousColorFunction {
  const ramp = RAMPS[name];
  return (t: number) => ramp(clamp(Number.isFinite(t) ? t : 0, 0, 1));
}
