/**
 * Color Utilities
 * Color parsing and continuous ramps powered by colord
 *
 * Organization:
 * - core: Basic color creation, conversion, and normalization
 * - gradients: Continuous ramps and sampling
 * - constants: Default ramp anchors and preview colors
 */

// Core color utilities
export * from "./core";
export type { ColorInput, HexColor, RGB, HSV } from "./core";

// Gradient generation
export * from "./gradients";
export type { ColorRamp, RampOptions } from "./gradients";

// Constants
export * from "./constants";
