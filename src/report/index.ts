/**
 * Reporting: ordering, CSV output and summary statistics.
 */

export { sortRows } from "./sort.js";
export { CSV_HEADER, csvQuote, formatCsv, writeCsv } from "./csv.js";
export {
  computeSummary,
  formatSummary,
  type SummaryInputs,
  type FormatSummaryOptions,
} from "./summary.js";
