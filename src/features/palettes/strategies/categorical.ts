/**
 * CategoricalTableStrategy
 * Interpolates across the anchors of a ColorBrewer palette
 */

import { createRamp } from "../../../core/utils/color";
import type { BrewerTable } from "../brewer/table";
import { attempt, err, failure } from "../core/errors";
import type { ColorDescriptor, PaletteStrategy, StrategyContext, StrategyResult } from "../core/types";
import { mismatch } from "./mismatch";

export class CategoricalTableStrategy implements PaletteStrategy {
  readonly name = "categorical-table";

  constructor(private readonly table: BrewerTable) {}

  matches(descriptor: ColorDescriptor): boolean {
    return descriptor.kind === "categorical";
  }

  async tryResolve(descriptor: ColorDescriptor, context: StrategyContext): Promise<StrategyResult> {
    if (descriptor.kind !== "categorical") {
      return mismatch(this.name, descriptor);
    }

    const anchors = this.table.lookup(descriptor.name);
    if (anchors === undefined) {
      return err(failure("UnknownName", `No table palette named ${descriptor.name}`));
    }

    return attempt(
      () => createRamp(anchors, { mode: context.config.interpolation }),
      "MalformedSource",
      `Invalid anchors for ${descriptor.name}`
    );
  }
}
