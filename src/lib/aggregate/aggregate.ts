import { MeasureFieldMissing, SchemaViolation } from "../pipeline/errors";
import { isDimensionValue, type DataRecord, type DimensionValue, type FieldValue } from "../records/schema";
import { reduceValues, reducedFieldName, type Reducer } from "./reducers";

export type GroupKey = readonly DimensionValue[];

export type AggregatedRecord = Readonly<{
  key: GroupKey;
  /** Group fields followed by one `<measure>_<reducer>` column per reduction. */
  values: DataRecord;
  /** Number of input records in the partition. */
  size: number;
}>;

export type AggregateOptions = {
  /** Exclude absent or null measures instead of failing. */
  skipMissing?: boolean;
};

type Partition = {
  key: GroupKey;
  indices: number[];
};

export function groupKeyOf(record: DataRecord, groupFields: readonly string[], index: number): GroupKey {
  return groupFields.map((field) => {
    const value = record[field];
    if (!isDimensionValue(value)) {
      throw new SchemaViolation(index, field, "is missing a group value");
    }
    return value;
  });
}

/** Stable identity for a key; keeps 10 and "10" apart. */
export function groupKeyId(key: GroupKey) {
  return JSON.stringify(key);
}

/** Partitions records by the tuple of `groupFields` values, in order of first appearance. */
export function partition(records: readonly DataRecord[], groupFields: readonly string[]): Partition[] {
  const partitions = new Map<string, Partition>();
  records.forEach((record, index) => {
    const key = groupKeyOf(record, groupFields, index);
    const id = groupKeyId(key);
    const existing = partitions.get(id);
    if (existing) {
      existing.indices.push(index);
    } else {
      partitions.set(id, { key, indices: [index] });
    }
  });
  return [...partitions.values()];
}

/**
 * Reduces every measure per partition with each reducer. Empty input yields
 * an empty result; no group fields yields one global group.
 */
export function aggregate(
  records: readonly DataRecord[],
  groupFields: readonly string[],
  measureFields: readonly string[],
  reducer: Reducer | readonly Reducer[],
  options: AggregateOptions = {}
): AggregatedRecord[] {
  const reducers: readonly Reducer[] = typeof reducer === "string" ? [reducer] : reducer;

  return partition(records, groupFields).map(({ key, indices }) => {
    const values: Record<string, FieldValue> = {};
    groupFields.forEach((field, i) => {
      values[field] = key[i];
    });

    for (const measure of measureFields) {
      const collected: number[] = [];
      for (const index of indices) {
        const value = records[index][measure];
        if (typeof value === "number") {
          collected.push(value);
        } else if (value === undefined || value === null) {
          if (!options.skipMissing) throw new MeasureFieldMissing(measure, key, index);
        } else {
          throw new SchemaViolation(index, measure, `expected a numeric measure, got "${value}"`);
        }
      }
      for (const r of reducers) {
        values[reducedFieldName(measure, r)] = reduceValues(r, collected);
      }
    }

    return Object.freeze({ key: Object.freeze([...key]), values: Object.freeze(values), size: indices.length });
  });
}

export function aggregatedRows(aggregated: readonly AggregatedRecord[]): DataRecord[] {
  return aggregated.map((agg) => agg.values);
}

/** Natural ordering of dimension values: numbers ascending, then strings by code unit. */
export function compareDimensionValues(a: DimensionValue, b: DimensionValue) {
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "number") return -1;
  if (typeof b === "number") return 1;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Returns a copy sorted by the given fields, each in natural order. */
export function sortAggregated(aggregated: readonly AggregatedRecord[], fields: readonly string[]): AggregatedRecord[] {
  return [...aggregated].sort((left, right) => {
    for (const field of fields) {
      const a = left.values[field];
      const b = right.values[field];
      if (!isDimensionValue(a) || !isDimensionValue(b)) continue;
      const cmp = compareDimensionValues(a, b);
      if (cmp !== 0) return cmp;
    }
    return 0;
  });
}
