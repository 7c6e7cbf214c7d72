/**
 * NamedRampStrategy
 * Built-in scientific ramps (rainbow, heat, terrain, topo, cm, gray)
 */

import { ok } from "../core/errors";
import type { ColorDescriptor, PaletteStrategy, StrategyResult } from "../core/types";
import { builtinRamp } from "../ramps/builtin";
import { mismatch } from "./mismatch";

export class NamedRampStrategy implements PaletteStrategy {
  readonly name = "named-ramp";

  matches(descriptor: ColorDescriptor): boolean {
    return descriptor.kind === "named-function" && descriptor.family === "builtin";
  }

  async tryResolve(descriptor: ColorDescriptor): Promise<StrategyResult> {
    if (descriptor.kind !== "named-function" || descriptor.family !== "builtin") {
      return mismatch(this.name, descriptor);
    }
    return ok(builtinRamp(descriptor.name));
  }
}
