/**
 * Descriptor Classification
 * Raw caller input -> exactly one ColorDescriptor variant
 */

import type { BrewerTable } from "../brewer/table";
import { isImageSource } from "../image/decoder";
import {
  BUILTIN_RAMP_NAMES,
  PERCEPTUAL_RAMP_NAMES,
  type BuiltinRampName,
  type ColorDescriptor,
  type PaletteInput,
  type PerceptualRampName,
} from "./types";

function isBuiltinName(value: string): value is BuiltinRampName {
  return BUILTIN_RAMP_NAMES.some((name) => name === value);
}

function isPerceptualName(value: string): value is PerceptualRampName {
  return PERCEPTUAL_RAMP_NAMES.some((name) => name === value);
}

function classifyString(value: string, table: BrewerTable): ColorDescriptor {
  if (value.length === 0) {
    return { kind: "absent" };
  }
  if (isBuiltinName(value)) {
    return { kind: "named-function", family: "builtin", name: value };
  }
  if (isPerceptualName(value)) {
    return { kind: "named-function", family: "perceptual", name: value };
  }

  const key = table.keyFor(value);
  if (key !== undefined) {
    return { kind: "categorical", name: key };
  }

  if (isImageSource(value)) {
    return { kind: "image", source: value };
  }

  return { kind: "unknown", input: value };
}

/**
 * Classify an input that already passed option validation
 *
 * @example
 * classifyDescriptor("spectral", table) // { kind: "categorical", name: "Spectral" }
 * classifyDescriptor(["red", "blue"], table) // { kind: "color-list", colors: ["red", "blue"] }
 */
export function classifyDescriptor(input: PaletteInput, table: BrewerTable): ColorDescriptor {
  if (input === undefined || input === null) {
    return { kind: "absent" };
  }

  if (typeof input === "number") {
    return { kind: "remote-id", id: input };
  }

  if (typeof input === "string") {
    return classifyString(input, table);
  }

  if (input.length === 0) {
    return { kind: "absent" };
  }
  if (input.length === 1) {
    return classifyString(input[0], table);
  }
  return { kind: "color-list", colors: [...input] };
}
