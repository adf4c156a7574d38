import * as fs from "fs";
import * as os from "os";
import * as path from "path";

import { describe, it, expect } from "vitest";

import { pivot } from "../../aggregate/pivot";
import { buildBoxChart } from "../../charts/box";
import { buildHeatmap } from "../../charts/heatmap";
import { buildFacetGrid } from "../../charts/facet";
import { buildBarChart, buildLineChart } from "../../charts/series";
import { buildOrdering, buildPalette } from "../../palette/ordering";
import { VegaLiteRenderer, toVegaLite } from "../vega_lite";

const strategies = buildOrdering(["FIFO", "LRU"], undefined, "strategy");
const palette = buildPalette(strategies, 2, "tab10");

describe("toVegaLite", () => {
  it("pins hue colors to the palette", () => {
    const spec = buildLineChart(
      [
        { strategy: "LRU", n: 10, cost_mean: 2 },
        { strategy: "FIFO", n: 10, cost_mean: 5 },
      ],
      { id: "line_cost", x: "n", y: "cost_mean", hue: { field: "strategy", ordering: strategies, palette } }
    );
    const vl = toVegaLite(spec);
    expect(vl.title).toBe("cost_mean vs. n");
    expect(vl.layer).toEqual([
      {
        mark: { type: "line", point: true },
        encoding: {
          x: { field: "n", type: "quantitative", title: "n" },
          y: { field: "cost_mean", type: "quantitative", title: "cost_mean" },
          color: {
            field: "strategy",
            type: "nominal",
            title: "strategy",
            sort: ["FIFO", "LRU"],
            scale: { domain: ["FIFO", "LRU"], range: ["#1f77b4", "#ff7f0e"] },
          },
        },
      },
    ]);
    expect(vl.data).toEqual({
      values: [
        { strategy: "FIFO", n: 10, cost_mean: 5 },
        { strategy: "LRU", n: 10, cost_mean: 2 },
      ],
    });
  });

  it("sorts a categorical bar axis by the run ordering", () => {
    const spec = buildBarChart(
      [
        { strategy: "LRU", cost_mean: 2 },
        { strategy: "FIFO", cost_mean: 5 },
      ],
      { id: "bar_cost", x: "strategy", y: "cost_mean", xOrdering: strategies }
    );
    const layers = toVegaLite(spec).layer;
    expect(Array.isArray(layers) ? layers[0] : null).toEqual({
      mark: "bar",
      encoding: {
        x: { field: "strategy", type: "nominal", title: "strategy", sort: ["FIFO", "LRU"] },
        y: { field: "cost_mean", type: "quantitative", title: "cost_mean" },
      },
    });
  });

  it("lays out a sparse facet grid with one column per column value", () => {
    const spec = buildFacetGrid(
      [
        { r: "A", c: "X", v: 1 },
        { r: "A", c: "Y", v: 2 },
        { r: "B", c: "Y", v: 3 },
      ],
      {
        id: "facet_grid_v",
        row: { field: "r", ordering: buildOrdering(["A", "B"], undefined, "r") },
        col: { field: "c", ordering: buildOrdering(["X", "Y"], undefined, "c") },
        panel: { kind: "bar", bindings: { x: "c", y: "v" } },
      }
    );
    const vl = toVegaLite(spec);
    expect(vl.columns).toBe(2);
    const concat = Array.isArray(vl.concat) ? vl.concat : [];
    expect(concat.map((panel) => (panel !== null && typeof panel === "object" && !Array.isArray(panel) ? panel.title : null))).toEqual([
      "A | X",
      "A | Y",
      "B | X",
      "B | Y",
    ]);
  });

  it("adds median labels to box plots", () => {
    const spec = buildBoxChart(
      [
        { strategy: "FIFO", ratio: 1 },
        { strategy: "FIFO", ratio: 3 },
      ],
      { id: "box_ratio", x: "strategy", y: "ratio", ordering: strategies, palette }
    );
    const layers = toVegaLite(spec).layer;
    expect(Array.isArray(layers) ? layers[1] : null).toEqual({
      data: { values: [{ strategy: "FIFO", ratio: 2, label: "2.00" }] },
      mark: { type: "text", dy: -6, fontSize: 9, color: "black" },
      encoding: {
        x: { field: "strategy", type: "nominal", title: "strategy", sort: ["FIFO", "LRU"] },
        y: { field: "ratio", type: "quantitative" },
        text: { field: "label" },
      },
    });
  });

  it("flattens heatmap cells with formatted labels", () => {
    const matrix = pivot(
      [
        { D: 16, p: 0.1, cost: 0.5 },
        { D: 32, p: 0.2, cost: 0.25 },
      ],
      "D",
      "p",
      "cost"
    );
    const vl = toVegaLite(buildHeatmap(matrix, { id: "heatmap_cost", decimals: 1 }));
    expect(vl.data).toEqual({
      values: [
        { D: 16, p: 0.1, cost: 0.5, label: "0.5" },
        { D: 16, p: 0.2, cost: null, label: "" },
        { D: 32, p: 0.1, cost: null, label: "" },
        { D: 32, p: 0.2, cost: 0.25, label: "0.3" },
      ],
    });
  });
});

describe("VegaLiteRenderer", () => {
  it("writes one file named after the chart id", async () => {
    const outDir = fs.mkdtempSync(path.join(os.tmpdir(), "vega-lite-"));
    const spec = buildHeatmap(pivot([{ D: 16, p: 0.1, cost: 1 }], "D", "p", "cost"), { id: "heatmap_cost" });

    const file = await new VegaLiteRenderer().render(spec, outDir);

    expect(file).toBe(path.join(outDir, "heatmap_cost.vl.json"));
    const written = JSON.parse(fs.readFileSync(file, "utf-8"));
    expect(written.$schema).toBe("https://vega.github.io/schema/vega-lite/v5.json");
    expect(written.title).toBe("Heatmap of cost");
  });
});
