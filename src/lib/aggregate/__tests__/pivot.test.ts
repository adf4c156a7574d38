import { describe, it, expect } from "vitest";

import { DuplicatePivotCell, UnknownCategory } from "../../pipeline/errors";
import type { DataRecord } from "../../records/schema";
import { aggregate, aggregatedRows } from "../aggregate";
import { NO_DATA, cellAt, pivot, reorderPivot } from "../pivot";

const sweep: DataRecord[] = [
  { D: 32, p: 0.1, cost: 8 },
  { D: 16, p: 0.1, cost: 4 },
  { D: 16, p: 0.5, cost: 6 },
  { D: 16, p: 0.1, cost: 2 },
];

describe("pivot", () => {
  it("matches the aggregated value for every cell", () => {
    const rows = aggregatedRows(aggregate(sweep, ["D", "p"], ["cost"], "mean"));
    const matrix = pivot(rows, "D", "p", "cost_mean");

    expect(matrix.rowKeys).toEqual([16, 32]);
    expect(matrix.colKeys).toEqual([0.1, 0.5]);
    for (const row of rows) {
      expect(cellAt(matrix, row.D ?? NaN, row.p ?? NaN)).toBe(row.cost_mean);
    }
    expect(matrix.cells).toEqual([
      [3, 6],
      [8, NO_DATA],
    ]);
  });

  it("marks absent combinations with NO_DATA, not zero", () => {
    const matrix = pivot(aggregatedRows(aggregate(sweep, ["D", "p"], ["cost"], "mean")), "D", "p", "cost_mean");
    expect(cellAt(matrix, 32, 0.5)).toBeNull();
    expect(cellAt(matrix, 64, 0.5)).toBeNull();
  });

  it("rejects conflicting duplicates", () => {
    expect(() => pivot(sweep, "D", "p", "cost")).toThrow(DuplicatePivotCell);
  });

  it("ignores duplicates that agree", () => {
    const matrix = pivot(
      [
        { D: 16, p: 0.1, cost: 4 },
        { D: 16, p: 0.1, cost: 4 },
      ],
      "D",
      "p",
      "cost"
    );
    expect(matrix.cells).toEqual([[4]]);
  });

  it("reorders rows and columns by an explicit order", () => {
    const matrix = pivot(aggregatedRows(aggregate(sweep, ["D", "p"], ["cost"], "mean")), "D", "p", "cost_mean");
    const reordered = reorderPivot(matrix, { rows: [64, 32, 16], cols: [0.5, 0.1] });
    expect(reordered.rowKeys).toEqual([32, 16]);
    expect(reordered.colKeys).toEqual([0.5, 0.1]);
    expect(reordered.cells).toEqual([
      [NO_DATA, 8],
      [6, 3],
    ]);
  });

  it("fails when the explicit order omits a key", () => {
    const matrix = pivot([{ D: 16, p: 0.1, cost: 4 }], "D", "p", "cost");
    expect(() => reorderPivot(matrix, { rows: [32] })).toThrow(UnknownCategory);
  });
});
