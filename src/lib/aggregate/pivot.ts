import { DuplicatePivotCell, SchemaViolation, UnknownCategory } from "../pipeline/errors";
import { isDimensionValue, type DataRecord, type DimensionValue } from "../records/schema";
import { compareDimensionValues, groupKeyId } from "./aggregate";

/** Marks a (row, col) pair for which no data exists. Never zero. */
export const NO_DATA = null;
export type PivotCell = number | typeof NO_DATA;

export type PivotMatrix = Readonly<{
  rowField: string;
  colField: string;
  valueField: string;
  rowKeys: readonly DimensionValue[];
  colKeys: readonly DimensionValue[];
  cells: readonly (readonly PivotCell[])[];
}>;

function naturalKeys(keys: Iterable<DimensionValue>) {
  return [...keys].sort(compareDimensionValues);
}

function dimensionAt(row: DataRecord, field: string, index: number): DimensionValue {
  const value = row[field];
  if (!isDimensionValue(value)) {
    throw new SchemaViolation(index, field, "is missing a pivot key");
  }
  return value;
}

/**
 * Reshapes rows into a row × column matrix. Rows sharing a (row, col) pair
 * must agree on the value; aggregate first when they do not.
 */
export function pivot(
  rows: readonly DataRecord[],
  rowField: string,
  colField: string,
  valueField: string
): PivotMatrix {
  const seen = new Map<string, PivotCell>();
  const rowKeys = new Map<string, DimensionValue>();
  const colKeys = new Map<string, DimensionValue>();

  rows.forEach((row, index) => {
    const r = dimensionAt(row, rowField, index);
    const c = dimensionAt(row, colField, index);
    const raw = row[valueField];
    if (raw === undefined) {
      throw new SchemaViolation(index, valueField, "is missing a pivot value");
    }
    if (typeof raw === "string") {
      throw new SchemaViolation(index, valueField, `expected a numeric pivot value, got "${raw}"`);
    }

    const cellId = groupKeyId([r, c]);
    if (seen.has(cellId)) {
      const previous = seen.get(cellId) ?? NO_DATA;
      if (previous !== raw) throw new DuplicatePivotCell(r, c, previous, raw);
      return;
    }
    seen.set(cellId, raw);
    rowKeys.set(groupKeyId([r]), r);
    colKeys.set(groupKeyId([c]), c);
  });

  const sortedRows = naturalKeys(rowKeys.values());
  const sortedCols = naturalKeys(colKeys.values());
  const cells = sortedRows.map((r) => sortedCols.map((c) => seen.get(groupKeyId([r, c])) ?? NO_DATA));

  return Object.freeze({
    rowField,
    colField,
    valueField,
    rowKeys: sortedRows,
    colKeys: sortedCols,
    cells,
  });
}

function indexOfKey(keys: readonly DimensionValue[], key: DimensionValue) {
  return keys.findIndex((k) => k === key);
}

export function cellAt(matrix: PivotMatrix, row: DimensionValue, col: DimensionValue): PivotCell {
  const i = indexOfKey(matrix.rowKeys, row);
  const j = indexOfKey(matrix.colKeys, col);
  if (i < 0 || j < 0) return NO_DATA;
  return matrix.cells[i][j];
}

/**
 * Reorders rows and/or columns. Every existing key must appear in the
 * supplied order; entries without data are dropped.
 */
export function reorderPivot(
  matrix: PivotMatrix,
  order: { rows?: readonly DimensionValue[]; cols?: readonly DimensionValue[] }
): PivotMatrix {
  const arrange = (keys: readonly DimensionValue[], explicit: readonly DimensionValue[] | undefined, field: string) => {
    if (!explicit) return keys;
    for (const key of keys) {
      if (indexOfKey(explicit, key) < 0) throw new UnknownCategory(key, field);
    }
    return explicit.filter((key) => indexOfKey(keys, key) >= 0);
  };

  const rowKeys = arrange(matrix.rowKeys, order.rows, matrix.rowField);
  const colKeys = arrange(matrix.colKeys, order.cols, matrix.colField);
  const cells = rowKeys.map((r) => colKeys.map((c) => cellAt(matrix, r, c)));

  return Object.freeze({ ...matrix, rowKeys, colKeys, cells });
}
