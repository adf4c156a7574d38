import { SchemaViolation } from "../pipeline/errors";
import {
  isDimension,
  type DataRecord,
  type FieldSpec,
  type FieldValue,
  type RawRecord,
  type RecordSchema,
  type TypedDataset,
} from "./schema";

const MISSING_MARKERS = new Set(["", "na", "nan", "null"]);

function isMissingMarker(raw: unknown) {
  if (raw === null) return true;
  if (typeof raw === "number") return Number.isNaN(raw);
  return typeof raw === "string" && MISSING_MARKERS.has(raw.trim().toLowerCase());
}

function coerceField(raw: unknown, spec: FieldSpec, index: number, field: string): FieldValue {
  if (isMissingMarker(raw)) {
    if (isDimension(spec)) {
      throw new SchemaViolation(index, field, "is a dimension and cannot be missing");
    }
    return null;
  }

  if (spec.kind === "categorical") {
    if (typeof raw === "number" && Number.isFinite(raw)) return String(raw);
    if (typeof raw === "string") return raw.trim();
    throw new SchemaViolation(index, field, `expected a category, got ${typeof raw}`);
  }

  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string") {
    value = Number(raw.trim());
  } else {
    throw new SchemaViolation(index, field, `expected a number, got ${typeof raw}`);
  }

  if (!Number.isFinite(value)) {
    throw new SchemaViolation(index, field, `expected a number, got "${String(raw)}"`);
  }
  if (spec.integer && !Number.isInteger(value)) {
    throw new SchemaViolation(index, field, `expected an integer, got ${value}`);
  }
  return value;
}

/**
 * Types raw rows against the declared schema. Undeclared columns are dropped;
 * the output keeps input order.
 */
export function validateRecords(rows: readonly RawRecord[], schema: RecordSchema): TypedDataset {
  const fields = Object.keys(schema);
  const records: DataRecord[] = rows.map((row, index) => {
    const typed: Record<string, FieldValue> = {};
    for (const field of fields) {
      if (!Object.prototype.hasOwnProperty.call(row, field) || row[field] === undefined) {
        throw new SchemaViolation(index, field, "is missing");
      }
      typed[field] = coerceField(row[field], schema[field], index, field);
    }
    return Object.freeze(typed);
  });

  return { schema, records };
}
