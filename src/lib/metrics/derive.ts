import {
  DerivationDomainError,
  DerivationInputMissing,
  DerivationNameConflict,
} from "../pipeline/errors";
import type { DataRecord, FieldValue, RecordSchema, TypedDataset } from "../records/schema";
import { ruleInputs, type DerivationRule, type DomainErrorPolicy } from "./rules";

export type DerivationOptions = {
  onDomainError?: DomainErrorPolicy;
};

export type DerivationResult = {
  dataset: TypedDataset;
  /** Domain errors tolerated under a non-abort policy. */
  issues: DerivationDomainError[];
};

function applyRule(rule: DerivationRule, record: DataRecord, index: number): number | null {
  const values: Record<string, number> = {};
  for (const field of ruleInputs(rule)) {
    const value = record[field];
    if (value === null) return null;
    if (typeof value !== "number") {
      throw new DerivationDomainError(index, rule.output, `input "${field}" is not numeric`);
    }
    values[field] = value;
  }

  switch (rule.kind) {
    case "ratio": {
      const denominator = values[rule.denominator];
      if (denominator === 0) {
        throw new DerivationDomainError(index, rule.output, `division by zero ("${rule.denominator}" is 0)`);
      }
      return values[rule.numerator] / denominator;
    }
    case "divide_constant":
      if (rule.divisor === 0) {
        throw new DerivationDomainError(index, rule.output, "division by the constant 0");
      }
      return values[rule.input] / rule.divisor;
    case "ceil":
      return Math.ceil(values[rule.input]);
    case "scale":
      return values[rule.input] * rule.factor;
    case "custom": {
      const result = rule.compute(values);
      if (!Number.isFinite(result)) {
        throw new DerivationDomainError(index, rule.output, `result ${result} is not finite`);
      }
      return result;
    }
  }
}

function checkRule(rule: DerivationRule, schema: RecordSchema) {
  if (Object.prototype.hasOwnProperty.call(schema, rule.output)) {
    throw new DerivationNameConflict(rule.output);
  }
  for (const field of ruleInputs(rule)) {
    if (!Object.prototype.hasOwnProperty.call(schema, field)) {
      throw new DerivationInputMissing(rule.output, field);
    }
  }
}

/**
 * Applies derivation rules in order. Each rule appends a numeric measure to
 * the schema and to every record, so later rules may read earlier outputs.
 */
export function deriveMetrics(
  dataset: TypedDataset,
  rules: readonly DerivationRule[],
  options: DerivationOptions = {}
): DerivationResult {
  const policy = options.onDomainError ?? "abort";
  const issues: DerivationDomainError[] = [];

  let schema: RecordSchema = dataset.schema;
  // Index into the caller's record list, kept so errors point at input rows.
  let rows: { index: number; record: DataRecord }[] = dataset.records.map((record, index) => ({ index, record }));

  for (const rule of rules) {
    checkRule(rule, schema);

    const next: { index: number; record: DataRecord }[] = [];
    for (const { index, record } of rows) {
      let value: FieldValue;
      try {
        value = applyRule(rule, record, index);
      } catch (error) {
        if (!(error instanceof DerivationDomainError) || policy === "abort") throw error;
        issues.push(error);
        if (policy === "skip_record") continue;
        value = null;
      }
      next.push({ index, record: Object.freeze({ ...record, [rule.output]: value }) });
    }

    rows = next;
    schema = { ...schema, [rule.output]: { kind: "numeric", role: "measure" } };
  }

  return {
    dataset: { schema, records: rows.map((row) => row.record) },
    issues,
  };
}
