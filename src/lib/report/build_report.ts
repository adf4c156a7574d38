/**
 * Report planning: raw rows + report config → chart specs.
 *
 * Pure and synchronous. Every stage completes over the whole dataset before
 * the next starts, and nothing is rendered here, so a failure leaves no
 * partial output behind.
 */

import { aggregate, aggregatedRows } from "../aggregate/aggregate";
import { pivot } from "../aggregate/pivot";
import { reducedFieldName, type Reducer } from "../aggregate/reducers";
import { filterRecords, partitionBy, selectExtremes } from "../aggregate/select";
import { artifactId } from "../charts/bindings";
import { buildBoxChart, type BoxBindings } from "../charts/box";
import { buildFacetGrid, type PanelBindings } from "../charts/facet";
import { buildHeatmap } from "../charts/heatmap";
import { buildBarChart, buildLineChart, type SeriesBindings } from "../charts/series";
import type { ChartKind, ChartSpec } from "../charts/types";
import { deriveMetrics } from "../metrics/derive";
import type { DomainErrorPolicy } from "../metrics/rules";
import { createLogger } from "../pipeline/logger";
import { MissingChartBinding, ReportConfigError, type DerivationDomainError } from "../pipeline/errors";
import { OrderingRegistry } from "../palette/registry";
import { dimensionFields, type DataRecord, type DimensionValue, type RawRecord, type RecordSchema } from "../records/schema";
import { validateRecords } from "../records/validate";
import type { ChartConfig, PanelConfig, ReportConfig } from "./config";

const log = createLogger("report");

export type ReportPlan = {
  name: string;
  schema: RecordSchema;
  records: readonly DataRecord[];
  inputCount: number;
  issues: DerivationDomainError[];
  registry: OrderingRegistry;
  charts: ChartSpec[];
};

export type BuildReportOptions = {
  /** Overrides the config's domain-error policy. */
  onDomainError?: DomainErrorPolicy;
};

type ChartContext = {
  registry: OrderingRegistry;
  config: ReportConfig;
};

function referencedFields(chart: ChartConfig | PanelConfig): [string, string | undefined][] {
  switch (chart.kind) {
    case "line":
    case "bar":
      return [
        ["x", chart.x],
        ["y", chart.y],
        ["hue", chart.hue],
        ["style", chart.style],
      ];
    case "box":
      return [
        ["x", chart.x],
        ["y", chart.y],
      ];
    case "facet_grid":
      return [["row facet", chart.row], ["column facet", chart.col], ...referencedFields(chart.panel)];
    case "heatmap":
      return [
        ["row", chart.row],
        ["col", chart.col],
        ["value", chart.value],
      ];
  }
}

function checkBindings(chart: ChartConfig, schema: RecordSchema) {
  const fields: [string, string | undefined][] = [
    ...referencedFields(chart),
    ...splitFields(chart).map((f): [string, string] => ["split", f]),
    ...(chart.extreme ? chart.extreme.within.map((f): [string, string] => ["extreme group", f]) : []),
    ["extreme", chart.extreme?.field],
    ...Object.keys(chart.where ?? {}).map((f): [string, string] => ["filter", f]),
  ];
  for (const [binding, field] of fields) {
    if (field !== undefined && !Object.prototype.hasOwnProperty.call(schema, field)) {
      throw new MissingChartBinding(chart.name, binding, field);
    }
  }
}

function splitFields(chart: ChartConfig): string[] {
  if (chart.splitBy === undefined) return [];
  return typeof chart.splitBy === "string" ? [chart.splitBy] : chart.splitBy;
}

type SplitPart = { values: DimensionValue[]; records: readonly DataRecord[] };

function splitParts(records: readonly DataRecord[], fields: readonly string[], registry: OrderingRegistry): SplitPart[] {
  let parts: SplitPart[] = [{ values: [], records }];
  for (const field of fields) {
    const order = registry.ordering(field).values;
    parts = parts.flatMap((part) =>
      partitionBy(part.records, field, order).map((p) => ({ values: [...part.values, p.value], records: p.records }))
    );
  }
  return parts;
}

function unique(fields: (string | undefined)[]) {
  const out: string[] = [];
  for (const field of fields) {
    if (field !== undefined && !out.includes(field)) out.push(field);
  }
  return out;
}

function seriesBindings(panel: PanelConfig & { kind: "line" | "bar" }, ctx: ChartContext): Omit<SeriesBindings, "id"> {
  const y = reducedFieldName(panel.y, panel.reducer);
  return {
    x: panel.x,
    y,
    xLabel: panel.xLabel,
    yLabel: panel.yLabel ?? y,
    xOrdering: ctx.registry.has(panel.x) ? ctx.registry.ordering(panel.x) : undefined,
    hue: panel.hue
      ? {
          field: panel.hue,
          ordering: ctx.registry.ordering(panel.hue),
          palette: ctx.registry.palette(panel.hue),
          label: panel.hueLabel,
        }
      : undefined,
    style: panel.style
      ? { field: panel.style, ordering: ctx.registry.ordering(panel.style), label: panel.styleLabel }
      : undefined,
    error: panel.error ? reducedFieldName(panel.y, panel.error) : undefined,
  };
}

function seriesReducers(panel: { reducer: Reducer; error?: "std" }): Reducer[] {
  return panel.error && panel.error !== panel.reducer ? [panel.reducer, panel.error] : [panel.reducer];
}

function boxBindings(panel: PanelConfig & { kind: "box" }, ctx: ChartContext): Omit<BoxBindings, "id"> {
  return {
    x: panel.x,
    y: panel.y,
    xLabel: panel.xLabel,
    yLabel: panel.yLabel,
    decimals: panel.decimals,
    ordering: ctx.registry.ordering(panel.x),
    palette: ctx.registry.palette(panel.x),
  };
}

function panelBindings(panel: PanelConfig, ctx: ChartContext): PanelBindings {
  switch (panel.kind) {
    case "line":
      return { kind: "line", bindings: seriesBindings(panel, ctx) };
    case "bar":
      return { kind: "bar", bindings: seriesBindings(panel, ctx) };
    case "box":
      return { kind: "box", bindings: boxBindings(panel, ctx) };
  }
}

function titleFor(chart: ChartConfig, split: readonly DimensionValue[]) {
  if (chart.title === undefined) return undefined;
  let title = chart.title;
  splitFields(chart).forEach((field, i) => {
    title = title.split(`{${field}}`).join(String(split[i]));
  });
  return title.split("{value}").join(split.join(" | "));
}

function buildChart(chart: ChartConfig, records: readonly DataRecord[], split: readonly DimensionValue[], ctx: ChartContext): ChartSpec {
  const kind: ChartKind = chart.kind;
  const id = artifactId(kind, chart.name, ...split);
  const title = titleFor(chart, split);

  switch (chart.kind) {
    case "line":
    case "bar": {
      const groups = unique([chart.x, chart.hue, chart.style]);
      const rows = aggregatedRows(aggregate(records, groups, [chart.y], seriesReducers(chart)));
      const bindings = { ...seriesBindings(chart, ctx), id, title };
      return chart.kind === "line" ? buildLineChart(rows, bindings) : buildBarChart(rows, bindings);
    }
    case "box":
      return buildBoxChart(records, { ...boxBindings(chart, ctx), id, title });
    case "facet_grid": {
      const panel = chart.panel;
      const rows =
        panel.kind === "box"
          ? records
          : aggregatedRows(
              aggregate(records, unique([chart.row, chart.col, panel.x, panel.hue, panel.style]), [panel.y], seriesReducers(panel))
            );
      return buildFacetGrid(rows, {
        id,
        title,
        row: chart.row ? { field: chart.row, ordering: ctx.registry.ordering(chart.row), label: chart.rowLabel } : undefined,
        col: chart.col ? { field: chart.col, ordering: ctx.registry.ordering(chart.col), label: chart.colLabel } : undefined,
        wrap: chart.wrap,
        panel: panelBindings(panel, ctx),
      });
    }
    case "heatmap": {
      const matrix = chart.reducer
        ? pivot(
            aggregatedRows(aggregate(records, [chart.row, chart.col], [chart.value], chart.reducer)),
            chart.row,
            chart.col,
            reducedFieldName(chart.value, chart.reducer)
          )
        : pivot(records, chart.row, chart.col, chart.value);
      return buildHeatmap(matrix, {
        id,
        title,
        xLabel: chart.xLabel,
        yLabel: chart.yLabel,
        valueLabel: chart.valueLabel,
        rowOrder: ctx.config.orderings[chart.row],
        colOrder: ctx.config.orderings[chart.col],
        colorScheme: chart.colorScheme,
        decimals: chart.decimals,
      });
    }
  }
}

function selectRecords(chart: ChartConfig, records: readonly DataRecord[]) {
  let selected: readonly DataRecord[] = chart.where ? filterRecords(records, chart.where) : records;
  if (chart.extreme) selected = selectExtremes(selected, chart.extreme);
  return selected;
}

export function buildReport(rows: readonly RawRecord[], config: ReportConfig, options: BuildReportOptions = {}): ReportPlan {
  const typed = validateRecords(rows, config.schema);
  log.info(`Validated ${typed.records.length} records against ${Object.keys(config.schema).length} fields`);

  const { dataset, issues } = deriveMetrics(typed, config.derive, {
    onDomainError: options.onDomainError ?? config.onDomainError,
  });
  if (issues.length > 0) {
    log.warn(`${issues.length} derivation domain errors tolerated (${options.onDomainError ?? config.onDomainError})`);
  }

  for (const dimension of Object.keys(config.orderings)) {
    if (!Object.prototype.hasOwnProperty.call(dataset.schema, dimension)) {
      throw new ReportConfigError(`Ordering declared for unknown field "${dimension}"`);
    }
  }

  for (const dimension of Object.keys(config.palette.schemes ?? {})) {
    if (!Object.prototype.hasOwnProperty.call(dataset.schema, dimension)) {
      throw new ReportConfigError(`Color scheme declared for unknown field "${dimension}"`);
    }
  }

  const registry = OrderingRegistry.fromRecords(dataset.records, dimensionFields(dataset.schema), {
    explicitOrders: config.orderings,
    scheme: config.palette.scheme,
    schemes: config.palette.schemes,
    paletteSize: config.palette.size,
  });
  const ctx: ChartContext = { registry, config };

  const charts: ChartSpec[] = [];
  for (const chart of config.charts) {
    checkBindings(chart, dataset.schema);
    const selected = selectRecords(chart, dataset.records);

    for (const part of splitParts(selected, splitFields(chart), registry)) {
      charts.push(buildChart(chart, part.records, part.values, ctx));
    }
  }

  const seen = new Set<string>();
  for (const spec of charts) {
    if (seen.has(spec.id)) throw new ReportConfigError(`Two charts share the artifact name "${spec.id}"`);
    seen.add(spec.id);
  }
  log.info(`Planned ${charts.length} charts for ${config.name}`);

  return {
    name: config.name,
    schema: dataset.schema,
    records: dataset.records,
    inputCount: rows.length,
    issues,
    registry,
    charts,
  };
}
