/**
 * Palette Core Types
 * Descriptors, color functions, strategies and the resolved palette
 */

import type { HexColor } from "../../../core/utils/color";
import type { Logger } from "../../../core/monitoring/core/logger";
import type { PaletteFailure, Result } from "./errors";
import type { PaletteConfig } from "./config";

// ============================================================================
// Colors
// ============================================================================

export type { HexColor };

/**
 * Pure function from t in [0, 1] to a normalized color
 */
export type ContinuousColorFunction = (t: number) => HexColor;

// ============================================================================
// Descriptors
// ============================================================================

export const BUILTIN_RAMP_NAMES = ["rainbow", "heat", "terrain", "topo", "cm", "gray"] as const;

export const PERCEPTUAL_RAMP_NAMES = ["viridis", "magma", "plasma", "inferno", "cividis"] as const;

export type BuiltinRampName = (typeof BUILTIN_RAMP_NAMES)[number];

export type PerceptualRampName = (typeof PERCEPTUAL_RAMP_NAMES)[number];

/**
 * Raw caller input before classification
 */
export type PaletteInput = string | number | readonly string[] | null | undefined;

export type ColorDescriptor =
  | { kind: "named-function"; family: "builtin"; name: BuiltinRampName }
  | { kind: "named-function"; family: "perceptual"; name: PerceptualRampName }
  | { kind: "categorical"; name: string }
  | { kind: "remote-id"; id: number }
  | { kind: "color-list"; colors: readonly string[] }
  | { kind: "image"; source: string }
  | { kind: "unknown"; input: string }
  | { kind: "absent" };

export type DescriptorKind = ColorDescriptor["kind"];

// ============================================================================
// Strategies
// ============================================================================

export type StrategyName =
  | "vector"
  | "named-ramp"
  | "perceptual-ramp"
  | "categorical-table"
  | "remote-id"
  | "image"
  | "default";

export interface StrategyContext {
  /** true: orange -> blue default, false: earth -> emerald */
  useDefault: boolean;
  config: PaletteConfig;
  logger: Logger;
}

export type StrategyResult = Result<ContinuousColorFunction, PaletteFailure>;

/**
 * One classification + resolution rule
 */
export interface PaletteStrategy {
  readonly name: StrategyName;

  /** Structural match; the resolver runs the first strategy that matches */
  matches(descriptor: ColorDescriptor): boolean;

  tryResolve(descriptor: ColorDescriptor, context: StrategyContext): Promise<StrategyResult>;
}

// ============================================================================
// Options & Output
// ============================================================================

export type InterpolationMode = "rgb" | "lab";

export interface PaletteOptions {
  /** Number of colors to return (default: 7) */
  n?: number;
  /** Reverse the sampled order (default: false) */
  reverse?: boolean;
  /** Reproducible shuffle with a fixed seed; overrides reverse (default: false) */
  shuffle?: boolean;
  /** true: orange -> blue default ramp, false: earth -> emerald (default: true) */
  default?: boolean;
  /** Attach an SVG swatch of the result (default: false) */
  preview?: boolean;
  interpolation?: InterpolationMode;
  serviceHost?: string;
  remoteTimeoutMs?: number;
  imageTimeoutMs?: number;
}

export interface PaletteFallback {
  /** Strategy whose failure triggered the fallback, or the classifier for unknown names */
  from: StrategyName | "classifier";
  failure: PaletteFailure;
}

export interface Palette {
  readonly colors: readonly HexColor[];
  readonly n: number;
  readonly reverse: boolean;
  readonly shuffle: boolean;
  readonly default: boolean;
  readonly descriptor: ColorDescriptor;
  /** Strategy whose color function produced the colors */
  readonly strategy: StrategyName;
  readonly fallback?: PaletteFallback;
  /** SVG markup when requested */
  readonly preview?: string;
}
