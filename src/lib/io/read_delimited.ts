import fs from "node:fs";

import { parse } from "csv-parse/sync";

export type DelimitedOptions = {
  delimiter?: string;
};

/** Parses delimited text with a header row into field-name → raw-value rows. */
export function parseDelimited(content: string, options: DelimitedOptions = {}): Record<string, string>[] {
  return parse(content, {
    columns: true,
    delimiter: options.delimiter ?? ",",
    skip_empty_lines: true,
    trim: true,
    bom: true,
  }) as Record<string, string>[];
}

export function readDelimited(filePath: string, options: DelimitedOptions = {}): Record<string, string>[] {
  const content = fs.readFileSync(filePath, "utf-8");
  return parseDelimited(content, options);
}
