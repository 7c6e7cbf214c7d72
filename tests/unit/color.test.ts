import { describe, it, expect } from "vitest";
import {
  brightness,
  createRamp,
  fromHsv,
  fromRgb,
  isValid,
  sortByBrightness,
  toHex,
  toRgb,
} from "@/core/utils/color";

describe("Color Normalization", () => {
  it("normalizes to uppercase #RRGGBB", () => {
    expect(toHex("red")).toBe("#FF0000");
    expect(toHex("#caf60d")).toBe("#CAF60D");
    expect(toHex("rgb(0, 128, 255)")).toBe("#0080FF");
  });

  it("drops the alpha channel", () => {
    expect(toHex("#ff000080")).toBe("#FF0000");
  });

  it("validates color strings", () => {
    expect(isValid("steelblue")).toBe(true);
    expect(isValid("#12345G")).toBe(false);
    expect(isValid("not-a-color")).toBe(false);
  });

  it("measures perceived brightness", () => {
    expect(brightness("#000000")).toBe(0);
    expect(brightness("#FFFFFF")).toBe(1);
  });

  it("builds hex from clamped channels", () => {
    expect(fromRgb(300, -5, 127.6)).toBe("#FF0080");
    expect(toRgb("#0080FF")).toEqual({ r: 0, g: 128, b: 255 });
  });

  it("builds hex from unit HSV", () => {
    expect(fromHsv(0, 1, 1)).toBe("#FF0000");
    expect(fromHsv(0.5, 1, 1)).toBe("#00FFFF");
    expect(fromHsv(0, 0, 0)).toBe("#000000");
  });
});

describe("createRamp", () => {
  it("interpolates between two anchors", () => {
    const ramp = createRamp(["#000000", "#FFFFFF"]);
    expect(ramp(0)).toBe("#000000");
    expect(ramp(0.5)).toBe("#808080");
    expect(ramp(1)).toBe("#FFFFFF");
  });

  it("passes exactly through inner anchors", () => {
    const ramp = createRamp(["#000000", "#FF0000", "#FFFFFF"]);
    expect(ramp(0.25)).toBe("#800000");
    expect(ramp(0.5)).toBe("#FF0000");
    expect(ramp(1)).toBe("#FFFFFF");
  });

  it("clamps t into [0, 1]", () => {
    const ramp = createRamp(["red", "blue"]);
    expect(ramp(-1)).toBe("#FF0000");
    expect(ramp(2)).toBe("#0000FF");
    expect(ramp(Number.NaN)).toBe("#FF0000");
  });

  it("returns a constant ramp for a single anchor", () => {
    const ramp = createRamp(["teal"]);
    expect(ramp(0)).toBe("#008080");
    expect(ramp(0.7)).toBe("#008080");
  });

  it("rejects empty and invalid anchor lists", () => {
    expect(() => createRamp([])).toThrow("At least 1 anchor color required");
    expect(() => createRamp(["red", "nope"])).toThrow("Invalid anchor color: nope");
  });

  it("mixes through LAB when asked", () => {
    const ramp = createRamp(["#000000", "#FFFFFF"], { mode: "lab" });
    expect(ramp(0)).toBe("#000000");
    expect(ramp(1)).toBe("#FFFFFF");
    expect(ramp(0.5)).toMatch(/^#[0-9A-F]{6}$/);
  });
});

describe("Gradient Helpers", () => {
  it("orders colors from dark to light", () => {
    expect(sortByBrightness(["#FFFFFF", "#000000", "#808080"])).toEqual([
      "#000000",
      "#808080",
      "#FFFFFF",
    ]);
  });

  it("keeps input order for equal brightness", () => {
    expect(sortByBrightness(["#FFFFFF", "#ffffff", "#000000"])).toEqual([
      "#000000",
      "#FFFFFF",
      "#FFFFFF",
    ]);
  });
});
