/**
 * Vote tally library entry point.
 *
 * The pipeline needs two calls:
 *
 *   const report = parseAndReport(text);       // sorted rows + summary
 *   writeCsv(report.rows, "voting_results.csv");
 *
 * tallyFile() does both around a file read.
 */

export * from "./types/index.js";
export * from "./errors/index.js";
export * from "./parser/index.js";
export * from "./aggregate/index.js";
export * from "./report/index.js";
export * from "./pipeline/index.js";
export {
  loadConfig,
  ConfigError,
  DEFAULT_TALLY_OPTIONS,
  TallyOptionsSchema,
  TallyOptionsError,
  loadTallyOptions,
  resolveTallyOptions,
  ParseMode,
  UnresolvedTopicPolicy,
  type AppConfig,
  type TallyOptions,
  type OptionsValidationIssue,
} from "./config/index.js";
export {
  createLogger,
  createRecordingLogger,
  type Logger,
  type LogEntry,
  type LogLevel,
} from "./logging/index.js";
