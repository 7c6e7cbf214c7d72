/**
 * Palettes Module - Main Exports
 * Descriptor classification, strategies, sampling and previews
 */

// Core
export * from "./core/types";
export { resolvePalette, PaletteResolver } from "./core/resolver";
export type { PaletteResolverOptions } from "./core/resolver";
export { classifyDescriptor } from "./core/classify";
export { sample, SHUFFLE_SEED } from "./core/sampler";

// Errors
export {
  ErrorCode,
  PaletteError,
  PaletteConfigError,
  PaletteOptionsError,
  ok,
  err,
  orElse,
  mapResult,
} from "./core/errors";
export type { PaletteFailure, PaletteFailureKind, Result } from "./core/errors";

// Configuration
export {
  PaletteConfigBuilder,
  getPaletteConfig,
  getDefaultPaletteConfig,
  paletteConfigSchema,
} from "./core/config";
export type { PaletteConfig } from "./core/config";

// Color sources
export { BrewerTable, getBrewerTable, loadBrewerTable } from "./brewer/table";
export type { BrewerCategory, BrewerEntry } from "./brewer/table";
export { builtinRamp } from "./ramps/builtin";
export { perceptualRamp, loadPerceptualModule } from "./ramps/perceptual";
export type { PerceptualModule, PerceptualLoader } from "./ramps/perceptual";
export { fetchRemotePalette, parseHexTags, paletteUrl } from "./remote/client";
export { SharpImageDecoder, extractImageColors, isImageSource } from "./image/decoder";
export type { DecodedImage, DecodeOptions, ImageDecoder } from "./image/decoder";

// Strategies
export * from "./strategies";

// Preview
export { renderSwatch } from "./preview/swatch";
export type { SwatchOptions } from "./preview/swatch";

// Validation
export * from "./schemas/options";
