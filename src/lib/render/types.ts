import type { ChartSpec } from "../charts/types";

/** Turns one chart spec into one artifact and returns the artifact's path. */
export interface ChartRenderer {
  readonly extension: string;
  render(spec: ChartSpec, outputDir: string): Promise<string>;
}
