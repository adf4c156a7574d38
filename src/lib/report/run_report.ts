/**
 * Report runner - reads input, plans every chart, then renders and writes the manifest
 */

import fs from "node:fs/promises";
import path from "node:path";

import { readDelimited } from "../io/read_delimited";
import { createLogger } from "../pipeline/logger";
import { RenderFailed, toFailureArtifact, type RenderFailure, type StageFailureArtifact } from "../pipeline/errors";
import type { ChartRenderer } from "../render/types";
import { VegaLiteRenderer } from "../render/vega_lite";
import { buildReport, type ReportPlan } from "./build_report";
import { loadReportConfig, type ReportConfig } from "./config";
import { getReportRuntimeConfig } from "./runtime_config";

const log = createLogger("report");

export type RunReportOptions = {
  config: ReportConfig;
  /** Directory the config's relative input path resolves against. */
  baseDir?: string;
  /** Overrides `config.input.path`; resolves against the working directory, like any CLI path. */
  inputPath?: string;
  outputDir?: string;
  renderer?: ChartRenderer;
  /** Plan only; nothing is written. */
  dryRun?: boolean;
};

export type ArtifactEntry = {
  id: string;
  kind: string;
  file: string;
};

export type ReportManifest = {
  report: string;
  input: string;
  generated_at: string;
  records: { input: number; derived: number };
  derivation_issues: StageFailureArtifact[];
  artifacts: ArtifactEntry[];
};

export type RunReportResult = {
  plan: ReportPlan;
  manifest: ReportManifest | null;
  manifestPath: string | null;
};

export async function runReport(options: RunReportOptions): Promise<RunReportResult> {
  const runtime = getReportRuntimeConfig();
  const { config } = options;
  const inputPath = options.inputPath
    ? path.resolve(options.inputPath)
    : path.resolve(options.baseDir ?? process.cwd(), config.input.path);
  const outputDir = path.resolve(options.outputDir ?? runtime.outputDir);
  const renderer = options.renderer ?? new VegaLiteRenderer();

  log.info(`Running ${config.name} (input=${inputPath})`);
  const rows = readDelimited(inputPath, { delimiter: config.input.delimiter });

  const plan = buildReport(rows, config, { onDomainError: runtime.domainErrorPolicy ?? undefined });

  if (options.dryRun) {
    for (const chart of plan.charts) log.info(`  - ${chart.kind}: ${chart.id}`);
    return { plan, manifest: null, manifestPath: null };
  }

  await fs.mkdir(outputDir, { recursive: true });
  const settled = await Promise.allSettled(plan.charts.map((chart) => renderer.render(chart, outputDir)));
  const files: string[] = [];
  const failures: RenderFailure[] = [];
  settled.forEach((result, i) => {
    if (result.status === "fulfilled") {
      files.push(result.value);
    } else {
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      failures.push({ id: plan.charts[i].id, reason });
      log.error(`Failed to render ${plan.charts[i].id}: ${reason}`);
    }
  });
  if (failures.length > 0) throw new RenderFailed(failures, plan.charts.length);

  const manifest: ReportManifest = {
    report: config.name,
    input: inputPath,
    generated_at: new Date().toISOString(),
    records: { input: plan.inputCount, derived: plan.records.length },
    derivation_issues: plan.issues.map((issue) => toFailureArtifact(issue, "derive")),
    artifacts: plan.charts.map((chart, i) => ({ id: chart.id, kind: chart.kind, file: path.basename(files[i]) })),
  };
  const manifestPath = path.join(outputDir, "manifest.json");
  await fs.writeFile(manifestPath, `${JSON.stringify(manifest, null, 2)}\n`, "utf8");

  log.info(`Wrote ${files.length} charts and manifest to ${outputDir}`);
  return { plan, manifest, manifestPath };
}

/** Loads a config file and runs it; the input path resolves against the config's directory. */
export async function runReportFromFile(
  configPath: string,
  options: Omit<RunReportOptions, "config" | "baseDir"> = {}
): Promise<RunReportResult> {
  const resolved = path.resolve(configPath);
  const config = await loadReportConfig(resolved);
  return runReport({ ...options, config, baseDir: path.dirname(resolved) });
}
