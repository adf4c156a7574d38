import { describe, it, expect } from "vitest";

import { aggregate, aggregatedRows } from "../../aggregate/aggregate";
import { ReportConfigError, UnboundHueCategory } from "../../pipeline/errors";
import { buildOrdering, buildPalette } from "../../palette/ordering";
import type { DataRecord } from "../../records/schema";
import { buildFacetGrid, type FacetGridBindings } from "../facet";

const runs: DataRecord[] = [
  { algorithm: "CoinFlip", graph: "Torus", D: 16, cost: 10 },
  { algorithm: "CoinFlip", graph: "Torus", D: 32, cost: 12 },
  { algorithm: "MoveToMin", graph: "Torus", D: 16, cost: 20 },
  { algorithm: "MoveToMin", graph: "Hypercube", D: 16, cost: 30 },
];

const algorithms = buildOrdering(["MoveToMin", "CoinFlip"], undefined, "algorithm");
const graphs = buildOrdering(["Torus", "Hypercube"], undefined, "graph");
const graphPalette = buildPalette(graphs, 2);
const rows = aggregatedRows(aggregate(runs, ["algorithm", "graph", "D"], ["cost"], "mean"));

function grid(overrides: Partial<FacetGridBindings> = {}): FacetGridBindings {
  return {
    id: "facet_grid_cost",
    col: { field: "algorithm", ordering: algorithms },
    panel: {
      kind: "line",
      bindings: { x: "D", y: "cost_mean", hue: { field: "graph", ordering: graphs, palette: graphPalette } },
    },
    ...overrides,
  };
}

describe("buildFacetGrid", () => {
  it("builds one panel per facet value in ordering order", () => {
    const spec = buildFacetGrid(rows, grid());
    expect(spec.panels.map((p) => [p.col, p.title, p.chart.id])).toEqual([
      ["MoveToMin", "MoveToMin", "facet_grid_cost[MoveToMin]"],
      ["CoinFlip", "CoinFlip", "facet_grid_cost[CoinFlip]"],
    ]);
    expect(spec.panels[1].chart.data.map((r) => r.cost_mean)).toEqual([10, 12]);
    expect(spec.title).toBe("facet_grid_cost");
  });

  it("shares one palette across panels", () => {
    const spec = buildFacetGrid(rows, grid());
    const colors = spec.panels.map((p) => (p.chart.kind === "line" ? p.chart.hue?.palette : undefined));
    expect(colors[0]).toBe(colors[1]);
  });

  it("fills row and column combinations without data with empty panels", () => {
    const spec = buildFacetGrid(rows, grid({ row: { field: "graph", ordering: graphs }, panel: { kind: "bar", bindings: { x: "D", y: "cost_mean" } } }));
    expect(spec.panels.map((p) => p.title)).toEqual([
      "Torus | MoveToMin",
      "Torus | CoinFlip",
      "Hypercube | MoveToMin",
      "Hypercube | CoinFlip",
    ]);
    expect(spec.panels[3]).toMatchObject({ row: "Hypercube", col: "CoinFlip" });
    expect(spec.panels[3].chart.data).toEqual([]);
    expect(spec.panels[3].chart.id).toBe("facet_grid_cost[Hypercube | CoinFlip]");
  });

  it("keeps every column under its header when an earlier row lacks a value", () => {
    const sparse: DataRecord[] = [
      { r: "A", c: "X", v: 1 },
      { r: "A", c: "Y", v: 2 },
      { r: "B", c: "Y", v: 3 },
    ];
    const spec = buildFacetGrid(sparse, {
      id: "facet_grid_sparse",
      row: { field: "r", ordering: buildOrdering(["A", "B"], undefined, "r") },
      col: { field: "c", ordering: buildOrdering(["X", "Y"], undefined, "c") },
      panel: { kind: "bar", bindings: { x: "c", y: "v" } },
    });
    expect(spec.panels.map((p) => [p.row, p.col, p.chart.data.length])).toEqual([
      ["A", "X", 1],
      ["A", "Y", 1],
      ["B", "X", 0],
      ["B", "Y", 1],
    ]);
  });

  it("rejects a grid without facets and wrapping with a row facet", () => {
    expect(() => buildFacetGrid(rows, grid({ col: undefined }))).toThrow(ReportConfigError);
    expect(() => buildFacetGrid(rows, grid({ row: { field: "graph", ordering: graphs }, wrap: 2 }))).toThrow(
      ReportConfigError
    );
  });

  it("keeps the wrap of a column-only grid", () => {
    expect(buildFacetGrid(rows, grid({ wrap: 3 })).wrap).toBe(3);
  });

  it("fails on a facet value outside the ordering", () => {
    const partial = buildOrdering(["MoveToMin"], undefined, "algorithm");
    expect(() => buildFacetGrid(rows, grid({ col: { field: "algorithm", ordering: partial } }))).toThrow(
      UnboundHueCategory
    );
  });
});
