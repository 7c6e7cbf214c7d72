import { describe, it, expect } from "vitest";
import { PaletteOptionsError } from "@/features/palettes/core/errors";
import { validateDescriptor, validateOptions } from "@/features/palettes/schemas/options";

describe("validateOptions", () => {
  it("fills defaults", () => {
    expect(validateOptions(undefined)).toEqual({
      n: 7,
      reverse: false,
      shuffle: false,
      default: true,
      preview: false,
    });
  });

  it("keeps provided values", () => {
    expect(validateOptions({ n: 3, reverse: true, interpolation: "lab", remoteTimeoutMs: 500 })).toMatchObject({
      n: 3,
      reverse: true,
      interpolation: "lab",
      remoteTimeoutMs: 500,
    });
  });

  it("explains an invalid n", () => {
    expect(() => validateOptions({ n: 0 })).toThrow("Invalid palette options: n: n must be at least 1");
    expect(() => validateOptions({ n: 1.5 })).toThrow("Invalid palette options: n: n must be an integer");
  });

  it("rejects mistyped flags", () => {
    expect(() => validateOptions({ reverse: "yes" })).toThrow(PaletteOptionsError);
    expect(() => validateOptions({ interpolation: "hsv" })).toThrow(PaletteOptionsError);
  });
});

describe("validateDescriptor", () => {
  it.each([["Spectral"], [42], [["#000000", "#FFFFFF"]], [null], [undefined]])("accepts %j", (input) => {
    expect(validateDescriptor(input)).toEqual(input);
  });

  it.each([[{ name: "Spectral" }], [true], [[1, 2]], [Number.NaN], [Number.NEGATIVE_INFINITY]])("rejects %j", (input) => {
    expect(() => validateDescriptor(input)).toThrow(PaletteOptionsError);
  });
});
