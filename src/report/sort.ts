/**
 * Row ordering.
 */

import type { ResultRow } from "../types/index.js";

/**
 * Sort rows by vote count, highest first. Rows with equal counts keep their
 * input order (Array.prototype.sort is stable), so output is reproducible.
 */
export function sortRows(rows: readonly ResultRow[]): ResultRow[] {
  return [...rows].sort((a, b) => b.votes - a.votes);
}
