import { aggregate } from "../aggregate/aggregate";
import { reducedFieldName } from "../aggregate/reducers";
import { UnboundHueCategory } from "../pipeline/errors";
import { positionOf, type CategoryOrdering, type Palette } from "../palette/ordering";
import { isDimensionValue, type DataRecord } from "../records/schema";
import { deepFreeze, formatValue, requireField } from "./bindings";
import type { BoxAnnotation, BoxChartSpec } from "./types";

export type BoxBindings = {
  id: string;
  title?: string;
  /** Category axis; also the hue dimension. */
  x: string;
  y: string;
  xLabel?: string;
  yLabel?: string;
  ordering: CategoryOrdering;
  palette: Palette;
  decimals?: number;
};

/**
 * Median per category, computed by the same aggregation a standalone
 * `aggregate(records, [x], [y], "median")` call performs.
 */
export function boxMedians(records: readonly DataRecord[], x: string, y: string) {
  const medianField = reducedFieldName(y, "median");
  return aggregate(records, [x], [y], "median", { skipMissing: true }).map((agg) => {
    const median = agg.values[medianField];
    return { category: agg.key[0], median: typeof median === "number" ? median : null };
  });
}

export function buildBoxChart(records: readonly DataRecord[], bindings: BoxBindings): BoxChartSpec {
  requireField(bindings.id, "x", bindings.x, records);
  requireField(bindings.id, "y", bindings.y, records);

  const rank = (row: DataRecord) => {
    const value = row[bindings.x];
    if (!isDimensionValue(value)) throw new UnboundHueCategory(String(value), bindings.x);
    return positionOf(bindings.ordering, value, bindings.x);
  };
  const data = records
    .map((row) => ({ row, rank: rank(row) }))
    .sort((a, b) => a.rank - b.rank)
    .map((entry) => entry.row);

  const decimals = bindings.decimals ?? 2;
  const annotations: BoxAnnotation[] = boxMedians(data, bindings.x, bindings.y)
    .sort((a, b) => positionOf(bindings.ordering, a.category) - positionOf(bindings.ordering, b.category))
    .map(({ category, median }) => ({ category, median, label: formatValue(median, decimals) }));

  const xLabel = bindings.xLabel ?? bindings.x;
  const yLabel = bindings.yLabel ?? bindings.y;

  return deepFreeze({
    kind: "box" as const,
    id: bindings.id,
    title: bindings.title ?? `${yLabel} by ${xLabel}`,
    x: { field: bindings.x, label: xLabel },
    y: { field: bindings.y, label: yLabel },
    hue: { field: bindings.x, label: xLabel, ordering: bindings.ordering, palette: bindings.palette },
    data,
    annotations,
  });
}
