import { describe, it, expect } from "vitest";

import { MissingChartBinding, ReportConfigError, UnknownCategory } from "../src/lib/pipeline/errors";
import { buildReport } from "../src/lib/report/build_report";
import { parseReportConfig, type ReportConfigInput } from "../src/lib/report/config";

const rows = [
  { strategy: "FIFO", n: "10", total_cost: "40" },
  { strategy: "LRU", n: "10", total_cost: "20" },
  { strategy: "FIFO", n: "10", total_cost: "60" },
  { strategy: "FIFO", n: "20", total_cost: "100" },
  { strategy: "LRU", n: "20", total_cost: "60" },
];

function config(overrides: Partial<ReportConfigInput> = {}) {
  return parseReportConfig({
    name: "paging",
    input: { path: "results.csv" },
    schema: {
      strategy: { kind: "categorical" },
      n: { kind: "numeric", role: "dimension", integer: true },
      total_cost: { kind: "numeric" },
    },
    derive: [{ kind: "ratio", output: "cost_per_item", numerator: "total_cost", denominator: "n" }],
    orderings: { strategy: ["LRU", "FIFO"] },
    charts: [
      { kind: "line", name: "cost", x: "n", y: "cost_per_item", hue: "strategy", error: "std" },
      { kind: "box", name: "ratio", x: "strategy", y: "cost_per_item", splitBy: "n", title: "Cost at n={value}" },
      { kind: "heatmap", name: "grid", row: "strategy", col: "n", value: "cost_per_item", reducer: "mean", decimals: 1 },
    ],
    ...overrides,
  });
}

describe("buildReport", () => {
  it("plans one artifact per chart and split value", () => {
    const plan = buildReport(rows, config());
    expect(plan.charts.map((c) => c.id)).toEqual(["line_cost", "box_ratio_10", "box_ratio_20", "heatmap_grid"]);
    expect(plan.inputCount).toBe(5);
    expect(plan.records.map((r) => r.cost_per_item)).toEqual([4, 2, 6, 5, 3]);
  });

  it("aggregates line data and orders it by the configured hue order", () => {
    const [line] = buildReport(rows, config()).charts;
    if (line.kind !== "line") throw new Error(`expected a line chart, got ${line.kind}`);
    expect(line.data.map((r) => [r.strategy, r.n, r.cost_per_item_mean])).toEqual([
      ["LRU", 10, 2],
      ["LRU", 20, 3],
      ["FIFO", 10, 5],
      ["FIFO", 20, 5],
    ]);
    expect(line.y.field).toBe("cost_per_item_mean");
    expect(line.error?.field).toBe("cost_per_item_std");
    expect(line.data[2].cost_per_item_std).toBe(Math.SQRT2);
  });

  it("fills split values into titles and keeps hue colors across charts", () => {
    const plan = buildReport(rows, config());
    const [line, box10] = plan.charts;
    if (line.kind !== "line" || box10.kind !== "box") throw new Error("unexpected chart kinds");
    expect(box10.title).toBe("Cost at n=10");
    expect(box10.annotations).toEqual([
      { category: "LRU", median: 2, label: "2.00" },
      { category: "FIFO", median: 5, label: "5.00" },
    ]);
    expect(box10.hue.palette).toBe(line.hue?.palette);
    expect(plan.registry.palette("strategy").entries).toEqual([
      { value: "LRU", color: "#66c2a5" },
      { value: "FIFO", color: "#fc8d62" },
    ]);
  });

  it("pivots heatmaps in the configured row order", () => {
    const heatmap = buildReport(rows, config()).charts[3];
    if (heatmap.kind !== "heatmap") throw new Error(`expected a heatmap, got ${heatmap.kind}`);
    expect(heatmap.matrix.rowKeys).toEqual(["LRU", "FIFO"]);
    expect(heatmap.matrix.colKeys).toEqual([10, 20]);
    expect(heatmap.matrix.cells).toEqual([
      [2, 3],
      [5, 5],
    ]);
  });

  it("is deterministic", () => {
    expect(buildReport(rows, config()).charts).toEqual(buildReport(rows, config()).charts);
  });

  it("splits by several dimensions", () => {
    const plan = buildReport(
      rows,
      config({
        charts: [
          {
            kind: "line",
            name: "cost",
            x: "n",
            y: "total_cost",
            splitBy: ["strategy", "n"],
            title: "{strategy} at {n}",
          },
        ],
      })
    );
    expect(plan.charts.map((c) => [c.id, c.title])).toEqual([
      ["line_cost_LRU_10", "LRU at 10"],
      ["line_cost_LRU_20", "LRU at 20"],
      ["line_cost_FIFO_10", "FIFO at 10"],
      ["line_cost_FIFO_20", "FIFO at 20"],
    ]);
  });

  it("selects extremes before aggregating", () => {
    const plan = buildReport(
      rows,
      config({
        charts: [
          {
            kind: "bar",
            name: "largest_n",
            x: "strategy",
            y: "cost_per_item",
            extreme: { field: "n", keep: "max", within: ["strategy"] },
          },
        ],
      })
    );
    const [bar] = plan.charts;
    expect(bar.kind === "bar" ? bar.data : []).toEqual([
      { strategy: "FIFO", cost_per_item_mean: 5 },
      { strategy: "LRU", cost_per_item_mean: 3 },
    ]);
  });

  it("applies the domain-error policy override", () => {
    const withZero = [...rows, { strategy: "LRU", n: "0", total_cost: "5" }];
    expect(() => buildReport(withZero, config())).toThrowError('Record 5: cannot derive "cost_per_item"');

    const plan = buildReport(withZero, config(), { onDomainError: "skip_record" });
    expect(plan.inputCount).toBe(6);
    expect(plan.records).toHaveLength(5);
    expect(plan.issues.map((issue) => issue.recordIndex)).toEqual([5]);
  });

  it("fails on a chart bound to a field the data lacks", () => {
    const bad = config({ charts: [{ kind: "line", name: "cost", x: "k", y: "cost_per_item" }] });
    expect(() => buildReport(rows, bad)).toThrow(MissingChartBinding);
  });

  it("fails on categories outside an explicit order", () => {
    const withRand = [...rows, { strategy: "RAND", n: "10", total_cost: "30" }];
    expect(() => buildReport(withRand, config())).toThrow(UnknownCategory);
  });

  it("rejects orderings for unknown fields and duplicate artifact names", () => {
    expect(() => buildReport(rows, config({ orderings: { policy: ["A"] } }))).toThrow(ReportConfigError);
    const twice = config({
      charts: [
        { kind: "box", name: "ratio", x: "strategy", y: "cost_per_item" },
        { kind: "box", name: "ratio", x: "strategy", y: "total_cost" },
      ],
    });
    expect(() => buildReport(rows, twice)).toThrowError('Two charts share the artifact name "box_ratio"');
  });

  it("orders a categorical bar axis by the configured order", () => {
    const plan = buildReport(rows, config({ charts: [{ kind: "bar", name: "cost", x: "strategy", y: "total_cost" }] }));
    const [bar] = plan.charts;
    if (bar.kind !== "bar") throw new Error(`expected a bar chart, got ${bar.kind}`);
    expect(bar.data.map((r) => r.strategy)).toEqual(["LRU", "FIFO"]);
    expect(bar.xOrder).toEqual(["LRU", "FIFO"]);
  });

  it("applies per-dimension color schemes and rejects them for unknown fields", () => {
    const plan = buildReport(rows, config({ palette: { schemes: { strategy: "tab10" } } }));
    expect(plan.registry.palette("strategy").entries.map((e) => e.color)).toEqual(["#1f77b4", "#ff7f0e"]);
    expect(plan.registry.palette("n").scheme).toBe("Set2");
    expect(() => buildReport(rows, config({ palette: { schemes: { policy: "tab10" } } }))).toThrowError(
      'Color scheme declared for unknown field "policy"'
    );
  });
});
