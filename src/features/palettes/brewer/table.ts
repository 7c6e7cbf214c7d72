/**
 * BrewerTable
 * Immutable ColorBrewer name -> anchor colors mapping, loaded once per process
 */

import { z } from "zod";
import { isValid, toHex, type HexColor } from "../../../core/utils/color";
import { PaletteConfigError } from "../core/errors";
import bundledDataset from "./brewer.json";

// ============================================================================
// Types
// ============================================================================

export type BrewerCategory = "diverging" | "sequential" | "qualitative";

export interface BrewerEntry {
  readonly name: string;
  readonly category: BrewerCategory;
  readonly colors: readonly HexColor[];
}

const colorSchema = z
  .string()
  .refine((value) => isValid(value), { message: "Invalid color" })
  .transform((value) => toHex(value));

const datasetSchema = z.object({
  palettes: z.record(
    z.string().min(1),
    z.object({
      category: z.enum(["diverging", "sequential", "qualitative"]),
      colors: z.array(colorSchema).min(3, "A table palette needs at least 3 anchors"),
    })
  ),
});

// ============================================================================
// Table
// ============================================================================

export class BrewerTable {
  private readonly byLowerName: ReadonlyMap<string, BrewerEntry>;

  constructor(entries: readonly BrewerEntry[]) {
    const index = new Map<string, BrewerEntry>();
    for (const entry of entries) {
      const key = entry.name.toLowerCase();
      if (index.has(key)) {
        throw new PaletteConfigError(`Duplicate palette name (case-insensitive): ${entry.name}`);
      }
      index.set(key, Object.freeze({ ...entry, colors: Object.freeze([...entry.colors]) }));
    }
    this.byLowerName = index;
    Object.freeze(this);
  }

  /**
   * Anchor colors for a name, matched case-insensitively
   */
  lookup(name: string): readonly HexColor[] | undefined {
    return this.byLowerName.get(name.toLowerCase())?.colors;
  }

  /**
   * Canonical (dataset) spelling of a name, matched case-insensitively
   */
  keyFor(name: string): string | undefined {
    return this.byLowerName.get(name.toLowerCase())?.name;
  }

  has(name: string): boolean {
    return this.byLowerName.has(name.toLowerCase());
  }

  names(category?: BrewerCategory): string[] {
    return [...this.byLowerName.values()]
      .filter((entry) => category === undefined || entry.category === category)
      .map((entry) => entry.name);
  }

  get size(): number {
    return this.byLowerName.size;
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate a raw dataset and build a table from it
 * Throws PaletteConfigError: a broken dataset is a fatal configuration error.
 */
export function loadBrewerTable(raw: unknown): BrewerTable {
  const parsed = datasetSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PaletteConfigError(
      `Invalid palette table: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join(", ")}`,
      { cause: parsed.error }
    );
  }

  const entries = Object.entries(parsed.data.palettes).map(([name, entry]) => ({
    name,
    category: entry.category,
    colors: entry.colors,
  }));

  return new BrewerTable(entries);
}

let sharedTable: BrewerTable | undefined;

/**
 * The bundled table, validated on first access and shared afterwards
 */
export function getBrewerTable(): BrewerTable {
  sharedTable ??= loadBrewerTable(bundledDataset);
  return sharedTable;
}
