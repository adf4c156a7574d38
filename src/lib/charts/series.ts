import { compareDimensionValues } from "../aggregate/aggregate";
import { UnboundHueCategory } from "../pipeline/errors";
import { positionOf, type CategoryOrdering, type Palette } from "../palette/ordering";
import { isDimensionValue, type DataRecord } from "../records/schema";
import { deepFreeze, requireField } from "./bindings";
import type { AxisBinding, BarChartSpec, HueBinding, LineChartSpec, StyleBinding } from "./types";

export type SeriesBindings = {
  id: string;
  title?: string;
  x: string;
  y: string;
  xLabel?: string;
  yLabel?: string;
  /** Run-scoped order of x values; natural order when absent. */
  xOrdering?: CategoryOrdering;
  hue?: { field: string; ordering: CategoryOrdering; palette: Palette; label?: string };
  style?: { field: string; ordering: CategoryOrdering; label?: string };
  /** Column holding the spread (typically `<measure>_std`). */
  error?: string;
  errorLabel?: string;
};

function rankOf(row: DataRecord, binding: { field: string; ordering: CategoryOrdering }) {
  const value = row[binding.field];
  if (!isDimensionValue(value)) {
    throw new UnboundHueCategory(String(value), binding.field);
  }
  return positionOf(binding.ordering, value, binding.field);
}

function buildSeries(kind: "line" | "bar", data: readonly DataRecord[], bindings: SeriesBindings) {
  requireField(bindings.id, "x", bindings.x, data);
  requireField(bindings.id, "y", bindings.y, data);
  if (bindings.hue) requireField(bindings.id, "hue", bindings.hue.field, data);
  if (bindings.style) requireField(bindings.id, "style", bindings.style.field, data);
  if (bindings.error) requireField(bindings.id, "error", bindings.error, data);

  const { hue, style, xOrdering } = bindings;
  const ranked = data.map((row) => ({
    row,
    hueRank: hue ? rankOf(row, hue) : 0,
    styleRank: style ? rankOf(row, style) : 0,
  }));

  ranked.sort((a, b) => {
    if (a.hueRank !== b.hueRank) return a.hueRank - b.hueRank;
    if (a.styleRank !== b.styleRank) return a.styleRank - b.styleRank;
    const ax = a.row[bindings.x];
    const bx = b.row[bindings.x];
    if (!isDimensionValue(ax) || !isDimensionValue(bx)) return 0;
    if (xOrdering) return positionOf(xOrdering, ax, bindings.x) - positionOf(xOrdering, bx, bindings.x);
    return compareDimensionValues(ax, bx);
  });

  const x: AxisBinding = { field: bindings.x, label: bindings.xLabel ?? bindings.x };
  const y: AxisBinding = { field: bindings.y, label: bindings.yLabel ?? bindings.y };
  const hueBinding: HueBinding | null = hue
    ? { field: hue.field, label: hue.label ?? hue.field, ordering: hue.ordering, palette: hue.palette }
    : null;
  const styleBinding: StyleBinding | null = style
    ? { field: style.field, label: style.label ?? style.field, ordering: style.ordering }
    : null;

  return {
    kind,
    id: bindings.id,
    title: bindings.title ?? `${y.label} vs. ${x.label}`,
    x,
    y,
    xOrder: xOrdering ? xOrdering.values : null,
    hue: hueBinding,
    style: styleBinding,
    error: bindings.error ? { field: bindings.error, label: bindings.errorLabel ?? bindings.error } : null,
    data: ranked.map((entry) => entry.row),
  };
}

export function buildLineChart(data: readonly DataRecord[], bindings: SeriesBindings): LineChartSpec {
  return deepFreeze({ ...buildSeries("line", data, bindings), kind: "line" as const });
}

export function buildBarChart(data: readonly DataRecord[], bindings: SeriesBindings): BarChartSpec {
  return deepFreeze({ ...buildSeries("bar", data, bindings), kind: "bar" as const });
}
