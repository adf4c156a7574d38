import { z } from "zod";

import type { DataRecord, DimensionValue } from "../records/schema";
import { groupKeyId, groupKeyOf, partition } from "./aggregate";

export const WhereSchema = z.record(z.string().min(1), z.union([z.string(), z.number()]));
export type Where = z.infer<typeof WhereSchema>;

export const ExtremeSelectionSchema = z
  .object({
    field: z.string().min(1),
    keep: z.enum(["min", "max"]),
    within: z.array(z.string().min(1)),
  })
  .strict();
export type ExtremeSelection = z.infer<typeof ExtremeSelectionSchema>;

/** Keeps records whose fields equal every value in `where`. */
export function filterRecords(records: readonly DataRecord[], where: Where): DataRecord[] {
  const entries = Object.entries(where);
  return records.filter((record) => entries.every(([field, value]) => record[field] === value));
}

/**
 * Keeps, per `within` group, the records sitting at the lowest or highest
 * value of `field` (e.g. the smallest cache size per strategy and n).
 */
export function selectExtremes(records: readonly DataRecord[], selection: ExtremeSelection): DataRecord[] {
  const target = new Map<string, number>();
  for (const { key, indices } of partition(records, selection.within)) {
    let best: number | null = null;
    for (const index of indices) {
      const value = records[index][selection.field];
      if (typeof value !== "number") continue;
      if (best === null || (selection.keep === "min" ? value < best : value > best)) best = value;
    }
    if (best !== null) target.set(groupKeyId(key), best);
  }

  return records.filter((record, index) => {
    const best = target.get(groupKeyId(groupKeyOf(record, selection.within, index)));
    return best !== undefined && record[selection.field] === best;
  });
}

/**
 * Splits records by one dimension. Parts follow `order` when given, first
 * appearance otherwise; values without records are skipped.
 */
export function partitionBy(
  records: readonly DataRecord[],
  field: string,
  order?: readonly DimensionValue[]
): { value: DimensionValue; records: DataRecord[] }[] {
  const parts = partition(records, [field]).map(({ key, indices }) => ({
    value: key[0],
    records: indices.map((index) => records[index]),
  }));
  if (!order) return parts;

  const rank = (value: DimensionValue) => {
    const position = order.indexOf(value);
    return position < 0 ? order.length : position;
  };
  return [...parts].sort((a, b) => rank(a.value) - rank(b.value));
}
