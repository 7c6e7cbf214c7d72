import { describe, it, expect } from "vitest";
import { BrewerTable, getBrewerTable, loadBrewerTable } from "@/features/palettes/brewer/table";
import { PaletteConfigError } from "@/features/palettes/core/errors";

describe("Bundled Brewer Table", () => {
  const table = getBrewerTable();

  it("loads once and is shared", () => {
    expect(getBrewerTable()).toBe(table);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.lookup("Spectral"))).toBe(true);
  });

  it("carries every family", () => {
    expect(table.size).toBe(35);
    expect(table.names("diverging")).toHaveLength(9);
    expect(table.names("sequential")).toHaveLength(18);
    expect(table.names("qualitative")).toHaveLength(8);
  });

  it("looks names up case-insensitively", () => {
    const spectral = table.lookup("Spectral");
    expect(spectral).toBeDefined();
    expect(table.lookup("spectral")).toEqual(spectral);
    expect(table.lookup("SPECTRAL")).toEqual(spectral);
    expect(table.keyFor("sPeCtRaL")).toBe("Spectral");
  });

  it("normalizes anchors to uppercase hex", () => {
    const spectral = table.lookup("Spectral") ?? [];
    expect(spectral).toHaveLength(11);
    expect(spectral[0]).toBe("#9E0142");
    expect(spectral[10]).toBe("#5E4FA2");
  });

  it("misses unknown names", () => {
    expect(table.lookup("NotARealPalette")).toBeUndefined();
    expect(table.keyFor("NotARealPalette")).toBeUndefined();
    expect(table.has("NotARealPalette")).toBe(false);
  });
});

describe("loadBrewerTable", () => {
  it("builds a table from a valid dataset", () => {
    const table = loadBrewerTable({
      palettes: { Dusk: { category: "sequential", colors: ["#111111", "navy", "#abcdef"] } },
    });

    expect(table).toBeInstanceOf(BrewerTable);
    expect(table.lookup("dusk")).toEqual(["#111111", "#000080", "#ABCDEF"]);
  });

  it("rejects palettes with fewer than 3 anchors", () => {
    expect(() =>
      loadBrewerTable({ palettes: { Tiny: { category: "qualitative", colors: ["#000000", "#FFFFFF"] } } })
    ).toThrow(PaletteConfigError);
  });

  it("rejects unparseable colors", () => {
    expect(() =>
      loadBrewerTable({
        palettes: { Broken: { category: "diverging", colors: ["#000000", "nope", "#FFFFFF"] } },
      })
    ).toThrow(/palettes\.Broken\.colors\.1: Invalid color/);
  });

  it("rejects names that collide case-insensitively", () => {
    expect(
      () =>
        new BrewerTable([
          { name: "Dusk", category: "sequential", colors: ["#000000", "#111111", "#222222"] },
          { name: "DUSK", category: "sequential", colors: ["#000000", "#111111", "#222222"] },
        ])
    ).toThrow("Duplicate palette name (case-insensitive): DUSK");
  });
});
