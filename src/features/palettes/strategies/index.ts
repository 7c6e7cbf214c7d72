/**
 * Strategy Set
 * Ordered by resolution priority
 */

import type { BrewerTable } from "../brewer/table";
import type { PaletteStrategy } from "../core/types";
import type { ImageDecoder } from "../image/decoder";
import type { PerceptualLoader } from "../ramps/perceptual";
import { CategoricalTableStrategy } from "./categorical";
import { ImageStrategy } from "./image";
import { NamedRampStrategy } from "./named";
import { PerceptualRampStrategy } from "./perceptual";
import { RemoteIDStrategy } from "./remote";
import { VectorStrategy } from "./vector";

export { CategoricalTableStrategy } from "./categorical";
export { DefaultStrategy, defaultRamp } from "./default";
export { ImageStrategy } from "./image";
export { NamedRampStrategy } from "./named";
export { PerceptualRampStrategy } from "./perceptual";
export { RemoteIDStrategy } from "./remote";
export { VectorStrategy } from "./vector";

export interface StrategySetOptions {
  table: BrewerTable;
  decoder?: ImageDecoder;
  perceptualLoader?: PerceptualLoader;
}

/**
 * Strategies preceding the default, in priority order
 */
export function createStrategies(options: StrategySetOptions): PaletteStrategy[] {
  return [
    new VectorStrategy(),
    new NamedRampStrategy(),
    new PerceptualRampStrategy(options.perceptualLoader),
    new CategoricalTableStrategy(options.table),
    new RemoteIDStrategy(),
    new ImageStrategy(options.decoder),
  ];
}
