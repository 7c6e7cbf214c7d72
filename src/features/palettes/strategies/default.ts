/**
 * DefaultStrategy
 * Terminal fallback: one of two fixed diverging ramps, never fails
 */

import {
  createRamp,
  EARTH_EMERALD_DIVERGING,
  ORANGE_BLUE_DIVERGING,
  type ColorRamp,
} from "../../../core/utils/color";
import { ok } from "../core/errors";
import type {
  ColorDescriptor,
  InterpolationMode,
  PaletteStrategy,
  StrategyContext,
  StrategyResult,
} from "../core/types";

/**
 * orange -> blue when useDefault is true, earth -> emerald otherwise
 */
export function defaultRamp(useDefault: boolean, mode: InterpolationMode = "rgb"): ColorRamp {
  return createRamp(useDefault ? ORANGE_BLUE_DIVERGING : EARTH_EMERALD_DIVERGING, { mode });
}

export class DefaultStrategy implements PaletteStrategy {
  readonly name = "default";

  matches(descriptor: ColorDescriptor): boolean {
    return descriptor.kind === "absent" || descriptor.kind === "unknown";
  }

  async tryResolve(_descriptor: ColorDescriptor, context: StrategyContext): Promise<StrategyResult> {
    return ok(this.resolve(context));
  }

  resolve(context: StrategyContext): ColorRamp {
    return defaultRamp(context.useDefault, context.config.interpolation);
  }
}
