/**
 * Core Color Utilities
 * Color parsing, normalization and channel math powered by colord
 *
 * Organization:
 * - core: Color creation, validation and hex normalization
 * - gradients: Continuous ramps built from anchor colors
 * - constants: Built-in default ramps
 */

import { colord, extend, type Colord } from "colord";
import mixPlugin from "colord/plugins/mix";
import namesPlugin from "colord/plugins/names";

// Extend colord with plugins
extend([mixPlugin, namesPlugin]);

// ============================================================================
// Types
// ============================================================================

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export interface HSV {
  h: number;
  s: number;
  v: number;
}

/**
 * Normalized color: uppercase `#RRGGBB`
 */
export type HexColor = string;

export type ColorInput = string | RGB | HSV | Colord;

// ============================================================================
// Core Color Creation
// ============================================================================

/**
 * Create a color instance from any input
 * Accepts: hex, rgb, hsl, hsv, named colors, or objects
 *
 * @example
 * color("#667eea")
 * color("rgb(102, 126, 234)")
 * color({ h: 240, s: 100, v: 100 })
 * color("steelblue")
 */
export function color(input: ColorInput): Colord {
  return colord(input);
}

/**
 * Validate if a value is a parseable color
 */
export function isValid(input: ColorInput): boolean {
  return colord(input).isValid();
}

// ============================================================================
// Color Conversion
// ============================================================================

/**
 * Convert color to normalized hex (`#RRGGBB`, alpha dropped)
 *
 * @example
 * toHex("red") // "#FF0000"
 * toHex("#caf60d") // "#CAF60D"
 */
export function toHex(input: ColorInput): HexColor {
  return color(input).toHex().substring(0, 7).toUpperCase();
}

/**
 * Convert color to RGB object
 */
export function toRgb(input: ColorInput): RGB {
  const { r, g, b } = color(input).toRgb();
  return { r, g, b };
}

/**
 * Build a normalized hex color from raw channel values
 */
export function fromRgb(r: number, g: number, b: number): HexColor {
  return toHex({ r: clampRgb(r), g: clampRgb(g), b: clampRgb(b) });
}

/**
 * Build a normalized hex color from HSV with every channel in [0, 1]
 */
export function fromHsv(h: number, s: number, v: number): HexColor {
  return toHex({ h: clampHue(h * 360), s: clampPercentage(s * 100), v: clampPercentage(v * 100) });
}

// ============================================================================
// Color Manipulation
// ============================================================================

/**
 * Mix two colors together through CIE LAB
 */
export function mix(color1: ColorInput, color2: ColorInput, ratio: number = 0.5): HexColor {
  return toHex(color(color1).mix(color2, ratio));
}

// ============================================================================
// Color Properties
// ============================================================================

/**
 * Get perceived brightness (0-1)
 */
export function brightness(input: ColorInput): number {
  return color(input).brightness();
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Clamp value between 0 and 255
 */
export function clampRgb(value: number): number {
  return Math.max(0, Math.min(255, Math.round(value)));
}

/**
 * Clamp hue between 0 and 360
 */
export function clampHue(value: number): number {
  return ((value % 360) + 360) % 360;
}

/**
 * Clamp percentage between 0 and 100
 */
export function clampPercentage(value: number): number {
  return Math.max(0, Math.min(100, value));
}
