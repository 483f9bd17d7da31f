/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  createRecordingLogger,
  formatLogEntry,
  LOG_LEVELS,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
  type RecordingLogger,
} from "./logger.js";
