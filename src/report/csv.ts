/**
 * CSV output.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import type { ResultRow } from "../types/index.js";
import { OutputWriteError } from "../errors/index.js";

export const CSV_HEADER = ["creator_name", "topic_number", "votes", "subject"] as const;

/**
 * Quote a CSV field per RFC 4180.
 * Fields containing commas, double quotes, or newlines are wrapped
 * in double quotes. Internal double quotes are escaped by doubling.
 */
export function csvQuote(value: string): string {
  if (
    value.includes(",") ||
    value.includes('"') ||
    value.includes("\n") ||
    value.includes("\r")
  ) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatRecord(fields: readonly (string | number)[]): string {
  return fields.map((field) => csvQuote(String(field))).join(",");
}

/**
 * Render rows as CSV text: header line, one line per row, `\n` terminated.
 * Rows are written in the order given.
 *
 * Lines end in LF, not the CRLF of RFC 4180, so output from CSV writers that
 * use CRLF differs only in line endings.
 */
export function formatCsv(rows: readonly ResultRow[]): string {
  const lines = [formatRecord(CSV_HEADER)];
  for (const row of rows) {
    lines.push(formatRecord([row.creatorName, row.topicNumber, row.votes, row.subject]));
  }
  return lines.join("\n") + "\n";
}

/**
 * Write rows to a UTF-8 CSV file, creating its directory if needed.
 *
 * @throws OutputWriteError if the directory or file cannot be written
 */
export function writeCsv(rows: readonly ResultRow[], outputPath: string): void {
  const content = formatCsv(rows);
  try {
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, content, "utf-8");
  } catch (err) {
    throw new OutputWriteError(outputPath, err);
  }
}
