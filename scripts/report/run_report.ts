import "dotenv/config";

import minimist from "minimist";

import { toFailureArtifact } from "../../src/lib/pipeline/errors";
import { runReportFromFile } from "../../src/lib/report/run_report";

type Args = {
  config?: string;
  out?: string;
  input?: string;
  dry_run?: boolean;
};

async function main() {
  const argv = minimist<Args>(process.argv.slice(2), { string: ["config", "out", "input"], boolean: ["dry_run"] });
  const configPath = argv.config?.trim();

  if (!configPath) {
    throw new Error(
      "Usage: tsx scripts/report/run_report.ts --config <report.json> [--out <dir>] [--input <results.csv>] [--dry_run]"
    );
  }

  const result = await runReportFromFile(configPath, {
    outputDir: argv.out,
    inputPath: argv.input,
    dryRun: argv.dry_run === true,
  });

  if (result.manifestPath) {
    console.log(`\n✅ ${result.plan.charts.length} charts written. Manifest: ${result.manifestPath}`);
  } else {
    console.log(`\n✅ Dry run planned ${result.plan.charts.length} charts.`);
  }
}

main().catch((error: unknown) => {
  console.error(`\n❌ Report failed`);
  console.error(JSON.stringify(toFailureArtifact(error, "report"), null, 2));
  process.exit(1);
});
