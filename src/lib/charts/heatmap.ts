import { reorderPivot, type PivotMatrix } from "../aggregate/pivot";
import type { SequentialScheme } from "../palette/schemes";
import type { DimensionValue } from "../records/schema";
import { deepFreeze } from "./bindings";
import type { HeatmapSpec } from "./types";

export type HeatmapBindings = {
  id: string;
  title?: string;
  xLabel?: string;
  yLabel?: string;
  valueLabel?: string;
  rowOrder?: readonly DimensionValue[];
  colOrder?: readonly DimensionValue[];
  colorScheme?: SequentialScheme;
  /** Decimals of the printed cell values. */
  decimals?: number;
};

/** Rows and columns keep the matrix's natural key order unless an explicit order is given. */
export function buildHeatmap(matrix: PivotMatrix, bindings: HeatmapBindings): HeatmapSpec {
  const arranged =
    bindings.rowOrder || bindings.colOrder
      ? reorderPivot(matrix, { rows: bindings.rowOrder, cols: bindings.colOrder })
      : matrix;

  const valueLabel = bindings.valueLabel ?? matrix.valueField;
  return deepFreeze({
    kind: "heatmap" as const,
    id: bindings.id,
    title: bindings.title ?? `Heatmap of ${valueLabel}`,
    x: { field: matrix.colField, label: bindings.xLabel ?? matrix.colField },
    y: { field: matrix.rowField, label: bindings.yLabel ?? matrix.rowField },
    value: { field: matrix.valueField, label: valueLabel },
    matrix: arranged,
    colorScheme: bindings.colorScheme ?? "blues",
    decimals: bindings.decimals ?? 2,
  });
}
