/**
 * Vega-Lite translation of chart specs.
 *
 * Colors and category order come from the chart's bindings so every chart of a
 * run encodes a category the same way.
 */

import fs from "node:fs/promises";
import path from "node:path";

import { formatValue } from "../charts/bindings";
import type {
  AxisBinding,
  BarChartSpec,
  BoxChartSpec,
  ChartSpec,
  FacetGridSpec,
  HeatmapSpec,
  HueBinding,
  LineChartSpec,
  PanelSpec,
  StyleBinding,
} from "../charts/types";
import { createLogger } from "../pipeline/logger";
import type { DataRecord } from "../records/schema";
import type { ChartRenderer } from "./types";

export type Json = string | number | boolean | null | Json[] | { [key: string]: Json };
export type JsonObject = { [key: string]: Json };

const log = createLogger("render");

const VEGA_LITE_SCHEMA = "https://vega.github.io/schema/vega-lite/v5.json";

function rowsJson(rows: readonly DataRecord[]): Json[] {
  return rows.map((row) => ({ ...row }));
}

function fieldType(rows: readonly DataRecord[], field: string): "quantitative" | "ordinal" {
  return rows.length > 0 && rows.every((row) => typeof row[field] === "number") ? "quantitative" : "ordinal";
}

function axis(binding: AxisBinding, type: string): JsonObject {
  return { field: binding.field, type, title: binding.label };
}

function colorEncoding(hue: HueBinding): JsonObject {
  return {
    field: hue.field,
    type: "nominal",
    title: hue.label,
    sort: [...hue.ordering.values],
    scale: {
      domain: hue.palette.entries.map((entry) => entry.value),
      range: hue.palette.entries.map((entry) => entry.color),
    },
  };
}

function styleEncoding(style: StyleBinding): JsonObject {
  return { field: style.field, type: "nominal", title: style.label, sort: [...style.ordering.values] };
}

function xAxis(spec: LineChartSpec | BarChartSpec, type: string): JsonObject {
  const x = axis(spec.x, type);
  return spec.xOrder && type !== "quantitative" ? { ...x, sort: [...spec.xOrder] } : x;
}

function lineLayers(spec: LineChartSpec): JsonObject {
  const encoding: JsonObject = {
    x: xAxis(spec, fieldType(spec.data, spec.x.field)),
    y: axis(spec.y, "quantitative"),
  };
  if (spec.hue) encoding.color = colorEncoding(spec.hue);
  if (spec.style) encoding.strokeDash = styleEncoding(spec.style);

  const layers: JsonObject[] = [];
  if (spec.error) {
    layers.push({
      mark: { type: "errorband", opacity: 0.2 },
      encoding: { ...encoding, yError: { field: spec.error.field } },
    });
  }
  layers.push({
    mark: { type: "line", point: true },
    encoding: spec.style ? { ...encoding, shape: styleEncoding(spec.style) } : encoding,
  });
  return { data: { values: rowsJson(spec.data) }, layer: layers };
}

function barLayers(spec: BarChartSpec): JsonObject {
  const x = xAxis(spec, "nominal");
  const encoding: JsonObject = { x, y: axis(spec.y, "quantitative") };
  if (spec.hue) {
    encoding.color = colorEncoding(spec.hue);
    encoding.xOffset = { field: spec.hue.field, sort: [...spec.hue.ordering.values] };
  }

  const layers: JsonObject[] = [{ mark: "bar", encoding }];
  if (spec.error) {
    const errorEncoding: JsonObject = { x, y: axis(spec.y, "quantitative"), yError: { field: spec.error.field } };
    if (spec.hue) errorEncoding.xOffset = encoding.xOffset;
    layers.push({ mark: "errorbar", encoding: errorEncoding });
  }
  return { data: { values: rowsJson(spec.data) }, layer: layers };
}

function boxLayers(spec: BoxChartSpec): JsonObject {
  const order = [...spec.hue.ordering.values];
  const x: JsonObject = { ...axis(spec.x, "nominal"), sort: order };
  const annotations: Json[] = spec.annotations
    .filter((a) => a.median !== null)
    .map((a) => ({ [spec.x.field]: a.category, [spec.y.field]: a.median, label: a.label }));

  return {
    layer: [
      {
        data: { values: rowsJson(spec.data) },
        mark: { type: "boxplot" },
        encoding: { x, y: axis(spec.y, "quantitative"), color: { ...colorEncoding(spec.hue), legend: null } },
      },
      {
        data: { values: annotations },
        mark: { type: "text", dy: -6, fontSize: 9, color: "black" },
        encoding: { x, y: { field: spec.y.field, type: "quantitative" }, text: { field: "label" } },
      },
    ],
  };
}

function panelBody(spec: PanelSpec): JsonObject {
  switch (spec.kind) {
    case "line":
      return lineLayers(spec);
    case "bar":
      return barLayers(spec);
    case "box":
      return boxLayers(spec);
  }
}

function facetBody(spec: FacetGridSpec): JsonObject {
  const colCount = spec.col ? new Set(spec.panels.map((p) => p.col)).size : 1;
  return {
    columns: spec.wrap ?? colCount,
    concat: spec.panels.map((panel) => ({ title: panel.title, ...panelBody(panel.chart) })),
    resolve: { scale: { color: "shared", y: "shared" } },
  };
}

function heatmapBody(spec: HeatmapSpec): JsonObject {
  const { matrix } = spec;
  const values: Json[] = [];
  matrix.rowKeys.forEach((row, i) => {
    matrix.colKeys.forEach((col, j) => {
      const cell = matrix.cells[i][j];
      values.push({
        [matrix.rowField]: row,
        [matrix.colField]: col,
        [matrix.valueField]: cell,
        label: cell === null ? "" : formatValue(cell, spec.decimals),
      });
    });
  });

  const x: JsonObject = { ...axis(spec.x, "ordinal"), sort: [...matrix.colKeys] };
  const y: JsonObject = { ...axis(spec.y, "ordinal"), sort: [...matrix.rowKeys] };
  return {
    data: { values },
    encoding: { x, y },
    layer: [
      {
        mark: "rect",
        encoding: {
          color: { field: spec.value.field, type: "quantitative", title: spec.value.label, scale: { scheme: spec.colorScheme } },
        },
      },
      { mark: { type: "text", fontSize: 9 }, encoding: { text: { field: "label" } } },
    ],
  };
}

function chartBody(spec: ChartSpec): JsonObject {
  switch (spec.kind) {
    case "line":
    case "bar":
    case "box":
      return panelBody(spec);
    case "facet_grid":
      return facetBody(spec);
    case "heatmap":
      return heatmapBody(spec);
  }
}

export function toVegaLite(spec: ChartSpec): JsonObject {
  return { $schema: VEGA_LITE_SCHEMA, title: spec.title, ...chartBody(spec) };
}

/** Writes each spec as `<id>.vl.json`. */
export class VegaLiteRenderer implements ChartRenderer {
  readonly extension = ".vl.json";

  async render(spec: ChartSpec, outputDir: string): Promise<string> {
    const filePath = path.join(outputDir, `${spec.id}${this.extension}`);
    await fs.writeFile(filePath, `${JSON.stringify(toVegaLite(spec), null, 2)}\n`, "utf8");
    log.info(`Wrote ${spec.kind} ${filePath}`);
    return filePath;
  }
}
