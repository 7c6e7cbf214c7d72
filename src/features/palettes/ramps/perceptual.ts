/**
 * Perceptual Ramps
 * viridis-family interpolators from the optional d3-scale-chromatic package
 */

import { toHex } from "../../../core/utils/color";
import { clamp } from "../../../core/utils/math";
import type { ContinuousColorFunction, PerceptualRampName } from "../core/types";

/**
 * The slice of d3-scale-chromatic this module relies on
 */
export interface PerceptualModule {
  interpolateViridis(t: number): string;
  interpolateMagma(t: number): string;
  interpolatePlasma(t: number): string;
  interpolateInferno(t: number): string;
  interpolateCividis(t: number): string;
}

export type PerceptualLoader = () => Promise<PerceptualModule>;

/**
 * Import d3-scale-chromatic on demand; rejects when it is not installed
 */
export const loadPerceptualModule: PerceptualLoader = () => import("d3-scale-chromatic");

function interpolatorFor(module: PerceptualModule, name: PerceptualRampName): (t: number) => string {
  switch (name) {
    case "viridis":
      return module.interpolateViridis;
    case "magma":
      return module.interpolateMagma;
    case "plasma":
      return module.interpolatePlasma;
    case "inferno":
      return module.interpolateInferno;
    case "cividis":
      return module.interpolateCividis;
  }
}

/**
 * Wrap a d3 interpolator as a normalized continuous color function
 */
export function perceptualRamp(module: PerceptualModule, name: PerceptualRampName): ContinuousColorFunction {
  const interpolate = interpolatorFor(module, name);
  return (t: number) => toHex(interpolate(clamp(Number.isFinite(t) ? t : 0, 0, 1)));
}
