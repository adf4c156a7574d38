import { z } from "zod";

export const DomainErrorPolicySchema = z.enum(["abort", "skip_record", "mark_missing"]);
export type DomainErrorPolicy = z.infer<typeof DomainErrorPolicySchema>;

const FieldName = z.string().min(1);

export const RatioRuleSchema = z
  .object({ kind: z.literal("ratio"), output: FieldName, numerator: FieldName, denominator: FieldName })
  .strict();

export const DivideConstantRuleSchema = z
  .object({
    kind: z.literal("divide_constant"),
    output: FieldName,
    input: FieldName,
    divisor: z
      .number()
      .finite()
      .refine((d) => d !== 0, "divisor must not be zero"),
  })
  .strict();

export const CeilRuleSchema = z.object({ kind: z.literal("ceil"), output: FieldName, input: FieldName }).strict();

export const ScaleRuleSchema = z
  .object({ kind: z.literal("scale"), output: FieldName, input: FieldName, factor: z.number().finite() })
  .strict();

/** Derivation rules that can be declared in a report config file. */
export const DeclaredRuleSchema = z.discriminatedUnion("kind", [
  RatioRuleSchema,
  DivideConstantRuleSchema,
  CeilRuleSchema,
  ScaleRuleSchema,
]);
export type DeclaredRule = z.infer<typeof DeclaredRuleSchema>;

/** Programmatic rule; `compute` must be pure. */
export type CustomRule = {
  kind: "custom";
  output: string;
  inputs: readonly string[];
  compute: (values: Readonly<Record<string, number>>) => number;
};

export type DerivationRule = DeclaredRule | CustomRule;

export function ruleInputs(rule: DerivationRule): readonly string[] {
  switch (rule.kind) {
    case "ratio":
      return [rule.numerator, rule.denominator];
    case "divide_constant":
    case "ceil":
    case "scale":
      return [rule.input];
    case "custom":
      return rule.inputs;
  }
}

/** Convenience constructor for the common "a / b" metric. */
export function ratio(output: string, numerator: string, denominator: string): DerivationRule {
  return { kind: "ratio", output, numerator, denominator };
}
