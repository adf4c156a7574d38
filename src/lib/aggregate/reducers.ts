import { z } from "zod";

export const ReducerSchema = z.enum(["mean", "std", "median", "min", "max"]);
export type Reducer = z.infer<typeof ReducerSchema>;

function mean(values: readonly number[]) {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1); undefined for fewer than two values. */
function std(values: readonly number[]) {
  if (values.length < 2) return null;
  const m = mean(values);
  const squared = values.reduce((sum, v) => sum + (v - m) * (v - m), 0);
  return Math.sqrt(squared / (values.length - 1));
}

function median(values: readonly number[]) {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid];
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Reduces a list of values; an empty list reduces to null. */
export function reduceValues(reducer: Reducer, values: readonly number[]): number | null {
  if (values.length === 0) return null;
  switch (reducer) {
    case "mean":
      return mean(values);
    case "std":
      return std(values);
    case "median":
      return median(values);
    case "min":
      return values.reduce((acc, v) => (v < acc ? v : acc), values[0]);
    case "max":
      return values.reduce((acc, v) => (v > acc ? v : acc), values[0]);
  }
}

export function reducedFieldName(measure: string, reducer: Reducer) {
  return `${measure}_${reducer}`;
}
