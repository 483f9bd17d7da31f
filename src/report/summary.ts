/**
 * Summary statistics and the printed report.
 */

import type { ResultRow, SummaryStats } from "../types/index.js";

export interface SummaryInputs {
  messageCount: number;
  skippedVotes?: number;
}

/**
 * Compute summary statistics over result rows.
 * The top row is the first row holding the maximum count, which is the same
 * row `sortRows` puts first.
 */
export function computeSummary(
  rows: readonly ResultRow[],
  inputs: SummaryInputs
): SummaryStats {
  let totalVotes = 0;
  let topRow: ResultRow | null = null;
  const creators = new Set<string>();
  const topics = new Set<string>();

  for (const row of rows) {
    totalVotes += row.votes;
    if (topRow === null || row.votes > topRow.votes) {
      topRow = row;
    }
    creators.add(row.creatorName);
    // JSON keeps the pair unambiguous whatever the name contains
    topics.add(JSON.stringify([row.creatorName, row.topicNumber]));
  }

  return {
    messageCount: inputs.messageCount,
    totalRows: rows.length,
    totalVotes,
    topRow,
    distinctCreators: creators.size,
    distinctTopics: topics.size,
    skippedVotes: inputs.skippedVotes ?? 0,
  };
}

export interface FormatSummaryOptions {
  /** Rows shown in the table. Default: 10 */
  topN?: number;
  /** Subjects longer than this are cut and end in "...". Default: 40 */
  subjectWidth?: number;
}

function preview(subject: string, width: number): string {
  return subject.length > width ? `${subject.slice(0, width)}...` : subject;
}

/**
 * Format the statistics and a table of the highest-voted rows.
 *
 * @param rows - Rows in report order (already sorted)
 */
export function formatSummary(
  summary: SummaryStats,
  rows: readonly ResultRow[],
  options: FormatSummaryOptions = {}
): string {
  const { topN = 10, subjectWidth = 40 } = options;

  if (rows.length === 0) {
    return "No topics found.";
  }

  const lines: string[] = [];
  lines.push(`Found ${summary.totalRows} topics from ${summary.messageCount} messages:`);
  lines.push("-".repeat(80));
  lines.push(`${"Creator".padEnd(15)} ${"Topic#".padEnd(8)} ${"Votes".padEnd(8)} Subject`);
  lines.push("-".repeat(80));

  for (const row of rows.slice(0, topN)) {
    lines.push(
      `${row.creatorName.padEnd(15)} ${String(row.topicNumber).padEnd(8)} ${String(row.votes).padEnd(8)} ${preview(row.subject, subjectWidth)}`
    );
  }

  if (rows.length > topN) {
    lines.push(`... and ${rows.length - topN} more topics`);
  }

  lines.push("-".repeat(80));
  lines.push(`Total votes:        ${summary.totalVotes}`);
  lines.push(`Distinct creators:  ${summary.distinctCreators}`);
  lines.push(`Distinct topics:    ${summary.distinctTopics}`);
  if (summary.topRow) {
    const top = summary.topRow;
    lines.push(`Top topic:          ${top.subject} (${top.creatorName} #${top.topicNumber}, ${top.votes} votes)`);
  }
  if (summary.skippedVotes > 0) {
    lines.push(`Skipped votes:      ${summary.skippedVotes}`);
  }

  return lines.join("\n");
}
