/**
 * Run-scoped orderings and palettes, one per dimension.
 *
 * Built once from the full dataset before any chart is built, then shared
 * read-only so a category keeps its color and position on every chart.
 */

import { compareDimensionValues } from "../aggregate/aggregate";
import { ReportConfigError } from "../pipeline/errors";
import { isDimensionValue, type DataRecord, type DimensionValue } from "../records/schema";
import { buildOrdering, buildPalette, type CategoryOrdering, type Palette } from "./ordering";
import { COLOR_SCHEMES, type ColorSchemeName } from "./schemes";

export type RegistryOptions = {
  explicitOrders?: Readonly<Record<string, readonly DimensionValue[]>>;
  scheme?: ColorSchemeName;
  /** Per-dimension overrides of `scheme`. */
  schemes?: Readonly<Record<string, ColorSchemeName>>;
  /** Colors used before wrapping; defaults to one per category, capped at the scheme length. */
  paletteSize?: number;
};

export class OrderingRegistry {
  private readonly orderings: ReadonlyMap<string, CategoryOrdering>;
  private readonly palettes: ReadonlyMap<string, Palette>;

  private constructor(orderings: Map<string, CategoryOrdering>, palettes: Map<string, Palette>) {
    this.orderings = orderings;
    this.palettes = palettes;
    Object.freeze(this);
  }

  /**
   * Categorical values keep first-appearance order and numeric sweep values
   * sort ascending, unless an explicit order is configured.
   */
  static fromRecords(
    records: readonly DataRecord[],
    dimensions: readonly string[],
    options: RegistryOptions = {}
  ): OrderingRegistry {
    const defaultScheme = options.scheme ?? "Set2";
    const orderings = new Map<string, CategoryOrdering>();
    const palettes = new Map<string, Palette>();

    for (const dimension of dimensions) {
      const values: DimensionValue[] = [];
      for (const record of records) {
        const value = record[dimension];
        if (isDimensionValue(value)) values.push(value);
      }

      const explicit = options.explicitOrders?.[dimension];
      const allNumeric = values.length > 0 && values.every((value) => typeof value === "number");
      const ordering = buildOrdering(
        explicit || !allNumeric ? values : [...values].sort(compareDimensionValues),
        explicit,
        dimension
      );

      const scheme = options.schemes?.[dimension] ?? defaultScheme;
      const size =
        options.paletteSize ?? Math.max(1, Math.min(ordering.values.length, COLOR_SCHEMES[scheme].length));
      orderings.set(dimension, ordering);
      palettes.set(dimension, buildPalette(ordering, size, scheme));
    }

    return new OrderingRegistry(orderings, palettes);
  }

  has(dimension: string): boolean {
    return this.orderings.has(dimension);
  }

  dimensions(): string[] {
    return [...this.orderings.keys()];
  }

  ordering(dimension: string): CategoryOrdering {
    const ordering = this.orderings.get(dimension);
    if (!ordering) throw new ReportConfigError(`No category ordering registered for "${dimension}"`);
    return ordering;
  }

  palette(dimension: string): Palette {
    const palette = this.palettes.get(dimension);
    if (!palette) throw new ReportConfigError(`No palette registered for "${dimension}"`);
    return palette;
  }
}
