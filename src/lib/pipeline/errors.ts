export type ReportErrorCode =
  | "SCHEMA_VIOLATION"
  | "DERIVATION_NAME_CONFLICT"
  | "DERIVATION_INPUT_MISSING"
  | "DERIVATION_DOMAIN_ERROR"
  | "MEASURE_FIELD_MISSING"
  | "DUPLICATE_PIVOT_CELL"
  | "UNKNOWN_CATEGORY"
  | "UNBOUND_HUE_CATEGORY"
  | "MISSING_CHART_BINDING"
  | "REPORT_CONFIG_INVALID"
  | "RENDER_FAILED";

export type ErrorContextValue = string | number | boolean | null | readonly (string | number | null)[];

export type ErrorContext = Readonly<Record<string, ErrorContextValue>>;

export type StageFailureArtifact = {
  stage_failed: string;
  code: ReportErrorCode | "UNEXPECTED";
  reason: string;
  context: ErrorContext;
  next_action: string;
};

export class ReportError extends Error {
  readonly code: ReportErrorCode;
  readonly context: ErrorContext;
  readonly next_action: string;

  constructor(params: {
    code: ReportErrorCode;
    reason: string;
    context?: ErrorContext;
    next_action?: string;
  }) {
    super(params.reason);
    this.name = "ReportError";
    this.code = params.code;
    this.context = params.context ?? {};
    this.next_action = params.next_action ?? "Fix the input data or report configuration and rerun.";
  }

  toFailureArtifact(stageName: string): StageFailureArtifact {
    return {
      stage_failed: stageName,
      code: this.code,
      reason: this.message,
      context: this.context,
      next_action: this.next_action,
    };
  }
}

export class SchemaViolation extends ReportError {
  readonly recordIndex: number;
  readonly field: string;

  constructor(recordIndex: number, field: string, detail: string) {
    super({
      code: "SCHEMA_VIOLATION",
      reason: `Record ${recordIndex}: field "${field}" ${detail}`,
      context: { record_index: recordIndex, field },
      next_action: "Correct the offending row or the declared schema.",
    });
    this.name = "SchemaViolation";
    this.recordIndex = recordIndex;
    this.field = field;
  }
}

export class DerivationNameConflict extends ReportError {
  readonly field: string;

  constructor(field: string) {
    super({
      code: "DERIVATION_NAME_CONFLICT",
      reason: `Derived field "${field}" already exists`,
      context: { field },
      next_action: "Rename the derivation output.",
    });
    this.name = "DerivationNameConflict";
    this.field = field;
  }
}

export class DerivationInputMissing extends ReportError {
  readonly output: string;
  readonly field: string;

  constructor(output: string, field: string) {
    super({
      code: "DERIVATION_INPUT_MISSING",
      reason: `Derivation "${output}" reads unknown field "${field}"`,
      context: { output, field },
      next_action: "Declare the input field in the schema or derive it in an earlier rule.",
    });
    this.name = "DerivationInputMissing";
    this.output = output;
    this.field = field;
  }
}

export class DerivationDomainError extends ReportError {
  readonly recordIndex: number;
  readonly output: string;

  constructor(recordIndex: number, output: string, detail: string) {
    super({
      code: "DERIVATION_DOMAIN_ERROR",
      reason: `Record ${recordIndex}: cannot derive "${output}": ${detail}`,
      context: { record_index: recordIndex, output },
    });
    this.name = "DerivationDomainError";
    this.recordIndex = recordIndex;
    this.output = output;
  }
}

export class MeasureFieldMissing extends ReportError {
  readonly field: string;
  readonly groupKey: readonly (string | number | null)[];
  readonly recordIndex: number;

  constructor(field: string, groupKey: readonly (string | number | null)[], recordIndex: number) {
    super({
      code: "MEASURE_FIELD_MISSING",
      reason: `Measure "${field}" is missing in record ${recordIndex} of group [${groupKey.join(", ")}]`,
      context: { field, group_key: groupKey, record_index: recordIndex },
      next_action: "Fill in the measure or aggregate with skipMissing enabled.",
    });
    this.name = "MeasureFieldMissing";
    this.field = field;
    this.groupKey = groupKey;
    this.recordIndex = recordIndex;
  }
}

export class DuplicatePivotCell extends ReportError {
  readonly row: string | number;
  readonly col: string | number;

  constructor(row: string | number, col: string | number, first: number | null, second: number | null) {
    super({
      code: "DUPLICATE_PIVOT_CELL",
      reason: `Pivot cell (${row}, ${col}) has conflicting values ${first} and ${second}`,
      context: { row, col, first, second },
      next_action: "Aggregate the data over the pivot dimensions before pivoting.",
    });
    this.name = "DuplicatePivotCell";
    this.row = row;
    this.col = col;
  }
}

export class UnknownCategory extends ReportError {
  readonly value: string | number;

  constructor(value: string | number, dimension?: string) {
    super({
      code: "UNKNOWN_CATEGORY",
      reason: dimension
        ? `Category "${value}" of "${dimension}" is not in the explicit order`
        : `Category "${value}" is not in the explicit order`,
      context: { value, dimension: dimension ?? null },
      next_action: "Add the category to the configured order for this dimension.",
    });
    this.name = "UnknownCategory";
    this.value = value;
  }
}

export class UnboundHueCategory extends ReportError {
  readonly value: string | number;

  constructor(value: string | number, dimension: string) {
    super({
      code: "UNBOUND_HUE_CATEGORY",
      reason: `Hue value "${value}" of "${dimension}" has no place in the supplied ordering`,
      context: { value, dimension },
    });
    this.name = "UnboundHueCategory";
    this.value = value;
  }
}

export class MissingChartBinding extends ReportError {
  constructor(chartId: string, binding: string, field: string) {
    super({
      code: "MISSING_CHART_BINDING",
      reason: `Chart "${chartId}": ${binding} field "${field}" is not present in the data`,
      context: { chart: chartId, binding, field },
    });
    this.name = "MissingChartBinding";
  }
}

export class ReportConfigError extends ReportError {
  readonly issues: string[];

  constructor(reason: string, issues: string[] = []) {
    super({
      code: "REPORT_CONFIG_INVALID",
      reason,
      context: { issues },
      next_action: "Fix the report configuration file.",
    });
    this.name = "ReportConfigError";
    this.issues = issues;
  }
}

export type RenderFailure = { id: string; reason: string };

export class RenderFailed extends ReportError {
  readonly failures: RenderFailure[];

  constructor(failures: RenderFailure[], total: number) {
    super({
      code: "RENDER_FAILED",
      reason: `${failures.length} of ${total} charts failed to render: ${failures.map((f) => f.id).join(", ")}`,
      context: { chart_ids: failures.map((f) => f.id), reasons: failures.map((f) => f.reason) },
      next_action: "Check the output directory and renderer, then rerun. No manifest was written.",
    });
    this.name = "RenderFailed";
    this.failures = failures;
  }
}

export function toFailureArtifact(error: unknown, stageName: string): StageFailureArtifact {
  if (error instanceof ReportError) {
    return error.toFailureArtifact(stageName);
  }

  const reason = error instanceof Error ? error.message : String(error);
  return {
    stage_failed: stageName,
    code: "UNEXPECTED",
    reason,
    context: {},
    next_action: "Review logs for the failing stage and rerun the report.",
  };
}
