import { ReportConfigError, UnboundHueCategory, UnknownCategory } from "../pipeline/errors";
import type { DimensionValue } from "../records/schema";
import { COLOR_SCHEMES, type ColorSchemeName } from "./schemes";

export type CategoryOrdering = Readonly<{
  dimension: string | null;
  values: readonly DimensionValue[];
}>;

export type PaletteEntry = Readonly<{ value: DimensionValue; color: string }>;

export type Palette = Readonly<{
  scheme: ColorSchemeName;
  size: number;
  entries: readonly PaletteEntry[];
}>;

/**
 * Orders the distinct `values`. With an explicit order, every value must be
 * listed in it and the result follows it, dropping unused entries; otherwise
 * first appearance wins.
 */
export function buildOrdering(
  values: Iterable<DimensionValue>,
  explicitOrder?: readonly DimensionValue[],
  dimension?: string
): CategoryOrdering {
  const distinct: DimensionValue[] = [];
  for (const value of values) {
    if (!distinct.includes(value)) distinct.push(value);
  }

  if (!explicitOrder) {
    return Object.freeze({ dimension: dimension ?? null, values: Object.freeze(distinct) });
  }

  const duplicates = explicitOrder.filter((value, i) => explicitOrder.indexOf(value) !== i);
  if (duplicates.length > 0) {
    throw new ReportConfigError(
      `Explicit order${dimension ? ` for "${dimension}"` : ""} lists categories more than once`,
      duplicates.map((value) => `duplicate category "${value}"`)
    );
  }

  for (const value of distinct) {
    if (!explicitOrder.includes(value)) throw new UnknownCategory(value, dimension);
  }

  return Object.freeze({
    dimension: dimension ?? null,
    values: Object.freeze(explicitOrder.filter((value) => distinct.includes(value))),
  });
}

/**
 * Assigns `scheme[i % paletteSize]` to the i-th category, so categories wrap
 * around a palette smaller than the ordering.
 */
export function buildPalette(
  ordering: CategoryOrdering,
  paletteSize: number,
  scheme: ColorSchemeName = "Set2"
): Palette {
  const colors = COLOR_SCHEMES[scheme];
  if (!Number.isInteger(paletteSize) || paletteSize < 1 || paletteSize > colors.length) {
    throw new ReportConfigError(`Palette size must be between 1 and ${colors.length} for ${scheme}, got ${paletteSize}`);
  }

  const entries = ordering.values.map((value, i) => Object.freeze({ value, color: colors[i % paletteSize] }));
  return Object.freeze({ scheme, size: paletteSize, entries: Object.freeze(entries) });
}

export function colorOf(palette: Palette, value: DimensionValue, dimension = "hue"): string {
  const entry = palette.entries.find((e) => e.value === value);
  if (!entry) throw new UnboundHueCategory(value, dimension);
  return entry.color;
}

export function positionOf(ordering: CategoryOrdering, value: DimensionValue, dimension = "hue"): number {
  const position = ordering.values.indexOf(value);
  if (position < 0) throw new UnboundHueCategory(value, ordering.dimension ?? dimension);
  return position;
}
