/**
 * Gradient Generation Utilities
 * Turn a short list of anchor colors into a continuous ramp over [0, 1]
 */

import type { ColorInput, HexColor } from "./core";
import { brightness, fromRgb, isValid, mix, toHex, toRgb } from "./core";
import { clamp, lerp } from "../math";

// ============================================================================
// Types
// ============================================================================

/**
 * Continuous ramp: maps t in [0, 1] to a normalized hex color
 */
export type ColorRamp = (t: number) => HexColor;

export interface RampOptions {
  /** Channel interpolation mode: straight RGB, or CIE LAB mixing */
  mode?: "rgb" | "lab";
}

// ============================================================================
// Ramp Construction
// ============================================================================

/**
 * Build a continuous ramp across evenly spaced anchors
 * First anchor sits at t=0, last at t=1. Throws when an anchor does not parse.
 *
 * @example
 * const ramp = createRamp(["#000000", "#FFFFFF"]);
 * ramp(0.5) // "#808080"
 */
export function createRamp(anchors: readonly ColorInput[], options: RampOptions = {}): ColorRamp {
  const { mode = "rgb" } = options;

  if (anchors.length === 0) {
    throw new Error("At least 1 anchor color required");
  }

  const invalid = anchors.find((anchor) => !isValid(anchor));
  if (invalid !== undefined) {
    throw new Error(`Invalid anchor color: ${String(invalid)}`);
  }

  const stops = anchors.map((anchor) => toHex(anchor));
  if (stops.length === 1) {
    const only = stops[0];
    return () => only;
  }

  const segments = stops.length - 1;

  return (t: number) => {
    const position = clamp(Number.isFinite(t) ? t : 0, 0, 1) * segments;
    const index = Math.min(Math.floor(position), segments - 1);
    const local = position - index;

    const from = stops[index];
    const to = stops[index + 1];

    if (local <= 0) return from;
    if (local >= 1) return to;

    return mode === "lab" ? mix(from, to, local) : lerpRgb(from, to, local);
  };
}

/**
 * Order colors from darkest to lightest by perceived brightness
 * Stable for colors of equal brightness
 */
export function sortByBrightness(colors: readonly ColorInput[]): HexColor[] {
  return colors
    .map((c, index) => ({ hex: toHex(c), brightness: brightness(c), index }))
    .sort((a, b) => a.brightness - b.brightness || a.index - b.index)
    .map((entry) => entry.hex);
}

// ============================================================================
// Internals
// ============================================================================

function lerpRgb(from: HexColor, to: HexColor, t: number): HexColor {
  const a = toRgb(from);
  const b = toRgb(to);
  return fromRgb(lerp(a.r, b.r, t), lerp(a.g, b.g, t), lerp(a.b, b.b, t));
}
