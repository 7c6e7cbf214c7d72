import { describe, it, expect } from "vitest";
import { getBrewerTable } from "@/features/palettes/brewer/table";
import { classifyDescriptor } from "@/features/palettes/core/classify";
import { isImageSource } from "@/features/palettes/image/decoder";

const table = getBrewerTable();

describe("classifyDescriptor", () => {
  it("treats missing input as absent", () => {
    expect(classifyDescriptor(undefined, table)).toEqual({ kind: "absent" });
    expect(classifyDescriptor(null, table)).toEqual({ kind: "absent" });
    expect(classifyDescriptor("", table)).toEqual({ kind: "absent" });
    expect(classifyDescriptor([], table)).toEqual({ kind: "absent" });
  });

  it("classifies lists of two or more as color lists", () => {
    expect(classifyDescriptor(["#000000", "white"], table)).toEqual({
      kind: "color-list",
      colors: ["#000000", "white"],
    });
  });

  it("classifies a one-element list by its element", () => {
    expect(classifyDescriptor(["Spectral"], table)).toEqual({ kind: "categorical", name: "Spectral" });
    expect(classifyDescriptor(["heat"], table)).toEqual({
      kind: "named-function",
      family: "builtin",
      name: "heat",
    });
  });

  it("classifies numbers as remote ids", () => {
    expect(classifyDescriptor(92095, table)).toEqual({ kind: "remote-id", id: 92095 });
    expect(classifyDescriptor(-5, table)).toEqual({ kind: "remote-id", id: -5 });
  });

  it("matches built-in ramp names exactly", () => {
    expect(classifyDescriptor("rainbow", table)).toEqual({
      kind: "named-function",
      family: "builtin",
      name: "rainbow",
    });
    expect(classifyDescriptor("Rainbow", table)).toEqual({ kind: "unknown", input: "Rainbow" });
  });

  it("matches perceptual ramp names exactly", () => {
    expect(classifyDescriptor("viridis", table)).toEqual({
      kind: "named-function",
      family: "perceptual",
      name: "viridis",
    });
  });

  it("matches table names in any casing and keeps the canonical key", () => {
    expect(classifyDescriptor("spectral", table)).toEqual({ kind: "categorical", name: "Spectral" });
    expect(classifyDescriptor("YLORRD", table)).toEqual({ kind: "categorical", name: "YlOrRd" });
  });

  it("classifies paths and URLs as images", () => {
    expect(classifyDescriptor("sunset.png", table)).toEqual({ kind: "image", source: "sunset.png" });
    expect(classifyDescriptor("https://images.test/sky", table)).toEqual({
      kind: "image",
      source: "https://images.test/sky",
    });
  });

  it("leaves unrecognized strings unknown", () => {
    expect(classifyDescriptor("NotARealPalette", table)).toEqual({
      kind: "unknown",
      input: "NotARealPalette",
    });
  });
});

describe("isImageSource", () => {
  it.each([
    ["photo.png", true],
    ["PHOTO.JPEG", true],
    ["scan.tiff", true],
    ["logo.svg", true],
    ["./assets/sky", true],
    ["C:\\images\\sky", true],
    ["http://images.test/a", true],
    ["file:///tmp/a.raw", true],
    ["sunset", false],
    ["notes.txt", false],
    ["   ", false],
  ])("%s -> %s", (input, expected) => {
    expect(isImageSource(input)).toBe(expected);
  });
});
