import type { PivotMatrix } from "../aggregate/pivot";
import type { CategoryOrdering, Palette } from "../palette/ordering";
import type { SequentialScheme } from "../palette/schemes";
import type { DataRecord, DimensionValue } from "../records/schema";

export type ChartKind = "line" | "bar" | "box" | "facet_grid" | "heatmap";

export type AxisBinding = Readonly<{ field: string; label: string }>;

export type HueBinding = Readonly<{
  field: string;
  label: string;
  ordering: CategoryOrdering;
  palette: Palette;
}>;

export type StyleBinding = Readonly<{
  field: string;
  label: string;
  ordering: CategoryOrdering;
}>;

export type FacetBinding = StyleBinding;

type ChartBase = {
  /** Artifact name, unique within a report run. */
  id: string;
  title: string;
};

type SeriesFields = ChartBase & {
  x: AxisBinding;
  /** Shared order of the x categories, when x is a registered dimension. */
  xOrder: readonly DimensionValue[] | null;
  y: AxisBinding;
  hue: HueBinding | null;
  style: StyleBinding | null;
  /** Spread column drawn around y: a band for lines, error bars for bars. */
  error: AxisBinding | null;
  data: readonly DataRecord[];
};

export type LineChartSpec = Readonly<SeriesFields & { kind: "line" }>;
export type BarChartSpec = Readonly<SeriesFields & { kind: "bar" }>;

export type BoxAnnotation = Readonly<{
  category: DimensionValue;
  median: number | null;
  label: string;
}>;

export type BoxChartSpec = Readonly<
  ChartBase & {
    kind: "box";
    x: AxisBinding;
    y: AxisBinding;
    hue: HueBinding;
    data: readonly DataRecord[];
    annotations: readonly BoxAnnotation[];
  }
>;

export type PanelSpec = LineChartSpec | BarChartSpec | BoxChartSpec;

export type FacetPanel = Readonly<{
  row: DimensionValue | null;
  col: DimensionValue | null;
  title: string;
  chart: PanelSpec;
}>;

export type FacetGridSpec = Readonly<
  ChartBase & {
    kind: "facet_grid";
    row: FacetBinding | null;
    col: FacetBinding | null;
    wrap: number | null;
    panelKind: PanelSpec["kind"];
    panels: readonly FacetPanel[];
  }
>;

export type HeatmapSpec = Readonly<
  ChartBase & {
    kind: "heatmap";
    x: AxisBinding;
    y: AxisBinding;
    value: AxisBinding;
    matrix: PivotMatrix;
    colorScheme: SequentialScheme;
    decimals: number;
  }
>;

export type ChartSpec = LineChartSpec | BarChartSpec | BoxChartSpec | FacetGridSpec | HeatmapSpec;
