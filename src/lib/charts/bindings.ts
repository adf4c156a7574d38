import { MissingChartBinding } from "../pipeline/errors";
import type { DataRecord, DimensionValue } from "../records/schema";
import type { ChartKind } from "./types";

export function requireField(chartId: string, binding: string, field: string, rows: readonly DataRecord[]) {
  for (const row of rows) {
    if (!Object.prototype.hasOwnProperty.call(row, field)) {
      throw new MissingChartBinding(chartId, binding, field);
    }
  }
}

function slug(part: DimensionValue) {
  return String(part)
    .trim()
    .replace(/[\s/\\:]+/g, "_");
}

/** `<kind>_<name>[_<value>...]`, safe to use as a file name stem. */
export function artifactId(kind: ChartKind, name: string, ...values: DimensionValue[]) {
  return [kind, name, ...values].map(slug).join("_");
}

export function formatValue(value: number | null, decimals: number) {
  return value === null ? "n/a" : value.toFixed(decimals);
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
