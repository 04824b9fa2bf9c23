/** CSV reading and writing via papaparse. */

import { readFileSync, writeFileSync } from "node:fs";
import Papa from "papaparse";
import { CSVError } from "./errors.js";
import type { Row } from "./types.js";

export interface CsvContent {
  fields: string[];
  rows: Row[];
  /** Problems papaparse recovered from, such as an unterminated quote. */
  errors: string[];
}

/**
 * Read a UTF-8 CSV file with a header row. Blank lines are skipped, so row
 * numbers count data records only.
 */
export function readCsv(path: string): CsvContent {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (e: unknown) {
    const code = e instanceof Error && "code" in e ? e.code : undefined;
    if (code === "ENOENT") {
      throw new CSVError(`CSV file not found: ${path}`, e);
    }
    const msg = e instanceof Error ? e.message : String(e);
    throw new CSVError(`Cannot read CSV file ${path}: ${msg}`, e);
  }

  const result = Papa.parse<Row>(raw.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: true,
  });

  return {
    fields: result.meta.fields ?? [],
    rows: result.data,
    errors: result.errors.map((e) =>
      e.row === undefined ? e.message : `Row ${e.row + 1}: ${e.message}`,
    ),
  };
}

export function writeCsv(
  path: string,
  fields: readonly string[],
  records: ReadonlyArray<Record<string, string>>,
): void {
  const data = records.map((r) => fields.map((f) => r[f] ?? ""));
  writeFileSync(path, Papa.unparse({ fields: [...fields], data }), "utf-8");
}
