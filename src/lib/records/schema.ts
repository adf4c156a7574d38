import { z } from "zod";

import { ReportConfigError } from "../pipeline/errors";

export const FieldSpecSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("categorical") }).strict(),
  z
    .object({
      kind: z.literal("numeric"),
      role: z.enum(["dimension", "measure"]).optional(),
      integer: z.boolean().optional(),
    })
    .strict(),
]);
export type FieldSpec = z.infer<typeof FieldSpecSchema>;

export const RecordSchemaSchema = z
  .record(z.string().min(1), FieldSpecSchema)
  .refine((schema) => Object.keys(schema).length > 0, { message: "schema declares no fields" });
export type RecordSchema = Readonly<Record<string, FieldSpec>>;

/** Validates a schema declaration read from JSON. */
export function parseSchema(raw: unknown): RecordSchema {
  const parsed = RecordSchemaSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReportConfigError(
      "Invalid record schema",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export type DimensionValue = string | number;
export type FieldValue = DimensionValue | null;

export type DataRecord = Readonly<Record<string, FieldValue>>;

export type RawRecord = Readonly<Record<string, unknown>>;

export interface TypedDataset {
  readonly schema: RecordSchema;
  readonly records: readonly DataRecord[];
}

export function isDimension(spec: FieldSpec): boolean {
  return spec.kind === "categorical" || spec.role === "dimension";
}

export function dimensionFields(schema: RecordSchema): string[] {
  return Object.keys(schema).filter((field) => isDimension(schema[field]));
}

export function measureFields(schema: RecordSchema): string[] {
  return Object.keys(schema).filter((field) => !isDimension(schema[field]));
}

export function isDimensionValue(value: unknown): value is DimensionValue {
  return typeof value === "string" || (typeof value === "number" && Number.isFinite(value));
}
