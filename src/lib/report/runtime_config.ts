/**
 * Report runtime configuration
 *
 * Settings that vary per machine or per invocation rather than per report.
 */

import { DomainErrorPolicySchema, type DomainErrorPolicy } from "../metrics/rules";

export interface ReportRuntimeConfig {
  outputDir: string;
  quiet: boolean;
  domainErrorPolicy: DomainErrorPolicy | null;
}

export function getReportRuntimeConfig(): ReportRuntimeConfig {
  const outputDir = process.env.REPORT_OUTPUT_DIR?.trim() || "plots";
  const quiet = process.env.REPORT_QUIET === "1";

  let domainErrorPolicy: DomainErrorPolicy | null = null;
  const rawPolicy = process.env.REPORT_DOMAIN_ERROR_POLICY;
  if (rawPolicy) {
    const parsed = DomainErrorPolicySchema.safeParse(rawPolicy.trim());
    if (parsed.success) {
      domainErrorPolicy = parsed.data;
    } else {
      console.warn(`[report] Ignoring REPORT_DOMAIN_ERROR_POLICY=${rawPolicy}. Expected abort|skip_record|mark_missing`);
    }
  }

  return { outputDir, quiet, domainErrorPolicy };
}
