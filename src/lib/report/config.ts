import fs from "node:fs/promises";

import { z } from "zod";

import { ReducerSchema } from "../aggregate/reducers";
import { ExtremeSelectionSchema, WhereSchema } from "../aggregate/select";
import { DeclaredRuleSchema, DomainErrorPolicySchema } from "../metrics/rules";
import { ReportConfigError } from "../pipeline/errors";
import { ColorSchemeNameSchema, SequentialSchemeSchema } from "../palette/schemes";
import { RecordSchemaSchema } from "../records/schema";

const Field = z.string().min(1);
const Decimals = z.number().int().min(0).max(12);

const SelectionFields = {
  /** Artifact name; combined with the chart kind and split value. */
  name: z.string().min(1).regex(/^[A-Za-z0-9_.-]+$/, "use letters, digits, '_', '.' or '-'"),
  title: z.string().optional(),
  where: WhereSchema.optional(),
  extreme: ExtremeSelectionSchema.optional(),
  /**
   * One chart per value (or value combination) of these dimensions. In the
   * title, `{<field>}` becomes that field's value and `{value}` all of them.
   */
  splitBy: z.union([Field, z.array(Field).min(1)]).optional(),
};

const SeriesFields = {
  x: Field,
  y: Field,
  hue: Field.optional(),
  style: Field.optional(),
  reducer: ReducerSchema.default("mean"),
  error: z.literal("std").optional(),
  xLabel: z.string().optional(),
  yLabel: z.string().optional(),
  hueLabel: z.string().optional(),
  styleLabel: z.string().optional(),
};

const BoxFields = {
  x: Field,
  y: Field,
  decimals: Decimals.optional(),
  xLabel: z.string().optional(),
  yLabel: z.string().optional(),
};

export const LinePanelSchema = z.object({ kind: z.literal("line"), ...SeriesFields }).strict();
export const BarPanelSchema = z.object({ kind: z.literal("bar"), ...SeriesFields }).strict();
export const BoxPanelSchema = z.object({ kind: z.literal("box"), ...BoxFields }).strict();

export const PanelConfigSchema = z.discriminatedUnion("kind", [LinePanelSchema, BarPanelSchema, BoxPanelSchema]);
export type PanelConfig = z.infer<typeof PanelConfigSchema>;

export const LineChartConfigSchema = LinePanelSchema.extend(SelectionFields);
export const BarChartConfigSchema = BarPanelSchema.extend(SelectionFields);
export const BoxChartConfigSchema = BoxPanelSchema.extend(SelectionFields);

export const FacetGridConfigSchema = z
  .object({
    kind: z.literal("facet_grid"),
    ...SelectionFields,
    row: Field.optional(),
    col: Field.optional(),
    rowLabel: z.string().optional(),
    colLabel: z.string().optional(),
    wrap: z.number().int().min(1).optional(),
    panel: PanelConfigSchema,
  })
  .strict()
  .refine((chart) => chart.row !== undefined || chart.col !== undefined, {
    message: "facet_grid needs a row or col facet",
  });

export const HeatmapConfigSchema = z
  .object({
    kind: z.literal("heatmap"),
    ...SelectionFields,
    row: Field,
    col: Field,
    value: Field,
    /** Pre-aggregate duplicates per (row, col); without it duplicates are an error. */
    reducer: ReducerSchema.optional(),
    colorScheme: SequentialSchemeSchema.default("blues"),
    decimals: Decimals.default(2),
    xLabel: z.string().optional(),
    yLabel: z.string().optional(),
    valueLabel: z.string().optional(),
  })
  .strict();

export const ChartConfigSchema = z.union([
  LineChartConfigSchema,
  BarChartConfigSchema,
  BoxChartConfigSchema,
  FacetGridConfigSchema,
  HeatmapConfigSchema,
]);
export type ChartConfig = z.infer<typeof ChartConfigSchema>;

export const ReportConfigSchema = z
  .object({
    name: z.string().min(1),
    input: z
      .object({
        path: z.string().min(1),
        delimiter: z.string().length(1).default(","),
      })
      .strict(),
    schema: RecordSchemaSchema,
    derive: z.array(DeclaredRuleSchema).default([]),
    onDomainError: DomainErrorPolicySchema.default("abort"),
    orderings: z.record(Field, z.array(z.union([z.string(), z.number()]))).default({}),
    palette: z
      .object({
        scheme: ColorSchemeNameSchema.default("Set2"),
        /** Per-dimension overrides of `scheme`. */
        schemes: z.record(Field, ColorSchemeNameSchema).optional(),
        size: z.number().int().min(1).optional(),
      })
      .strict()
      .default({}),
    charts: z.array(ChartConfigSchema).min(1),
  })
  .strict();
export type ReportConfig = z.infer<typeof ReportConfigSchema>;
export type ReportConfigInput = z.input<typeof ReportConfigSchema>;

function formatIssues(error: z.ZodError) {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export function parseReportConfig(raw: unknown, source = "report config"): ReportConfig {
  const parsed = ReportConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReportConfigError(`Invalid ${source}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

export async function loadReportConfig(configPath: string): Promise<ReportConfig> {
  const text = await fs.readFile(configPath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ReportConfigError(`${configPath} is not valid JSON`, [reason]);
  }
  return parseReportConfig(raw, configPath);
}
