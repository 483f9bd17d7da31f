/**
 * Tally pipeline.
 *
 *   readInputFile → parseMessages → aggregate → sortRows → computeSummary
 *                                                        → writeCsv
 *
 * parseAndReport() is the core entry point and touches no files; tallyFile()
 * adds the two file operations around it.
 */

import { readFileSync } from "node:fs";

import type { Message, ResultRow, SummaryStats } from "../types/index.js";
import { resolveTallyOptions, type TallyOptions } from "../config/tally/index.js";
import { FileAccessError, type ParseError, type UnresolvedTopicError } from "../errors/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import { parseMessages } from "../parser/index.js";
import { aggregate } from "../aggregate/index.js";
import { computeSummary, sortRows, writeCsv } from "../report/index.js";

export interface TallyRunOptions extends Partial<TallyOptions> {
  /** Default: console logger at info level */
  logger?: Logger;
}

export interface TallyReport {
  /** Sorted by votes, highest first */
  readonly rows: readonly ResultRow[];
  readonly summary: SummaryStats;
  readonly messages: readonly Message[];
  /** Lenient-mode grammar violations */
  readonly parseIssues: readonly ParseError[];
  /** Votes skipped because their topic was never declared */
  readonly unresolved: readonly UnresolvedTopicError[];
  /** Options the run resolved to, defaults included */
  readonly options: Readonly<TallyOptions>;
}

/**
 * Parse message text and build the sorted report.
 *
 * @throws TallyOptionsError if the options are invalid
 * @throws ParseError in strict parse mode
 * @throws UnresolvedTopicError under the "fail" unresolved-topic policy
 */
export function parseAndReport(inputText: string, options: TallyRunOptions = {}): TallyReport {
  const { logger = createLogger(), ...overrides } = options;
  const settings = resolveTallyOptions(overrides);

  const { messages, issues } = parseMessages(inputText, {
    mode: settings.parseMode,
    logger,
  });
  logger.info("Parsed messages", { messages: messages.length, issues: issues.length });

  const { rows, unresolved } = aggregate(messages, {
    unresolvedTopicPolicy: settings.unresolvedTopicPolicy,
    includeUnvotedTopics: settings.includeUnvotedTopics,
    logger,
  });

  const sorted = sortRows(rows);
  const summary = computeSummary(sorted, {
    messageCount: messages.length,
    skippedVotes: unresolved.length,
  });
  logger.info("Processed rows", {
    rows: summary.totalRows,
    totalVotes: summary.totalVotes,
    skippedVotes: summary.skippedVotes,
  });

  return {
    rows: sorted,
    summary,
    messages,
    parseIssues: issues,
    unresolved,
    options: settings,
  };
}

/**
 * Read the whole input file as UTF-8.
 *
 * @throws FileAccessError if the file is missing or unreadable
 */
export function readInputFile(path: string): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    throw new FileAccessError(path, err);
  }
}

/**
 * Read an input file, build the report and write it as CSV.
 * Nothing is written if reading, parsing or aggregation fails.
 */
export function tallyFile(
  inputPath: string,
  outputPath: string,
  options: TallyRunOptions = {}
): TallyReport {
  const logger = options.logger ?? createLogger();
  const text = readInputFile(inputPath);
  logger.debug("Read input file", { path: inputPath, characters: text.length });

  const report = parseAndReport(text, { ...options, logger });

  writeCsv(report.rows, outputPath);
  logger.info("CSV file generated", { path: outputPath, rows: report.rows.length });

  return report;
}
