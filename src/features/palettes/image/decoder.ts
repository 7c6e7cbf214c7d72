/**
 * Image Decoding & Color Extraction
 * Decode an image into RGBA pixels with sharp, then reduce it to a few
 * representative colors with gifenc's quantizer.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import sharp from "sharp";
import gifenc from "gifenc";
import { fromRgb, sortByBrightness, type HexColor } from "../../../core/utils/color";
import { describeError, err, failure, ok, type PaletteFailure, type Result } from "../core/errors";

// ============================================================================
// Types
// ============================================================================

export interface DecodedImage {
  /** RGBA, row-major, 4 bytes per pixel */
  data: Uint8Array;
  width: number;
  height: number;
}

export interface DecodeOptions {
  /** Longest side after downscaling */
  maxSize: number;
  /** Upper bound for fetching a remote image */
  timeoutMs: number;
}

/**
 * Turns a path or URL into pixels; failures are returned, not thrown
 */
export interface ImageDecoder {
  decode(source: string, options: DecodeOptions): Promise<Result<DecodedImage, PaletteFailure>>;
}

const IMAGE_EXTENSIONS = /\.(png|jpe?g|gif|webp|tiff?|avif|svg)$/i;

const OPAQUE_THRESHOLD = 128;

// gifenc publishes a CommonJS main; Node ESM only sees its default export
const { quantize } = gifenc;

// ============================================================================
// Source Detection
// ============================================================================

/**
 * Whether a string could plausibly name an image file or URL
 */
export function isImageSource(input: string): boolean {
  const value = input.trim();
  if (value.length === 0) return false;
  if (/^(https?|file):\/\//i.test(value)) return true;
  if (value.includes("/") || value.includes("\\")) return true;
  return IMAGE_EXTENSIONS.test(value);
}

// ============================================================================
// sharp Decoder
// ============================================================================

export class SharpImageDecoder implements ImageDecoder {
  async decode(source: string, options: DecodeOptions): Promise<Result<DecodedImage, PaletteFailure>> {
    const bytes = await this.read(source, options.timeoutMs);
    if (!bytes.success) return bytes;

    try {
      const { data, info } = await sharp(bytes.data)
        .resize({
          width: options.maxSize,
          height: options.maxSize,
          fit: "inside",
          withoutEnlargement: true,
        })
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      // Copy out of sharp's buffer so the pixels own a zero-offset ArrayBuffer
      return ok({ data: new Uint8Array(data), width: info.width, height: info.height });
    } catch (error) {
      return err(failure("MalformedSource", `Could not decode image: ${describeError(error)}`, error));
    }
  }

  private async read(source: string, timeoutMs: number): Promise<Result<Buffer, PaletteFailure>> {
    if (/^https?:\/\//i.test(source)) {
      try {
        const response = await fetch(source, { signal: AbortSignal.timeout(timeoutMs) });
        if (!response.ok) {
          return err(failure("SourceUnavailable", `HTTP ${response.status}: ${response.statusText}`));
        }
        return ok(Buffer.from(await response.arrayBuffer()));
      } catch (error) {
        return err(failure("SourceUnavailable", `Image request failed: ${describeError(error)}`, error));
      }
    }

    try {
      const path = /^file:\/\//i.test(source) ? fileURLToPath(source) : source;
      return ok(await readFile(path));
    } catch (error) {
      return err(failure("SourceUnavailable", `Could not read image: ${describeError(error)}`, error));
    }
  }
}

// ============================================================================
// Color Extraction
// ============================================================================

/**
 * Representative colors of an image, darkest first
 * Pixels under half opacity are ignored.
 */
export function extractImageColors(image: DecodedImage, maxColors: number): HexColor[] {
  const opaque = opaquePixels(image.data);
  if (opaque.length === 0) {
    return [];
  }

  const palette = quantize(opaque, maxColors);
  const colors = sortByBrightness(palette.map(([r, g, b]) => fromRgb(r, g, b)));

  return colors.filter((c, index) => index === 0 || c !== colors[index - 1]);
}

function opaquePixels(rgba: Uint8Array): Uint8Array {
  const pixelCount = Math.floor(rgba.length / 4);
  const out = new Uint8Array(pixelCount * 4);
  let length = 0;

  for (let p = 0; p < pixelCount * 4; p += 4) {
    if (rgba[p + 3] >= OPAQUE_THRESHOLD) {
      out[length] = rgba[p];
      out[length + 1] = rgba[p + 1];
      out[length + 2] = rgba[p + 2];
      out[length + 3] = 255;
      length += 4;
    }
  }

  return out.slice(0, length);
}
