/**
 * Lightweight logging utility.
 * Writes leveled entries tagged with the run ID to the console, an optional
 * log file, and any extra sinks (used by tests to capture warnings).
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly runId: string | null;
  readonly message: string;
  readonly context?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Additional receivers of every entry that passes the level filter */
  sinks?: readonly LogSink[];
}

const DEFAULT_OPTIONS: Required<LoggerOptions> = {
  level: "info",
  logDir: "output/logs",
  logFile: "tally.log",
  console: true,
  file: false,
  sinks: [],
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export interface RecordingLogger extends Logger {
  readonly entries: readonly LogEntry[];
  /** Entries at exactly the given level */
  at(level: LogLevel): LogEntry[];
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(entry: LogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const runId = entry.runId ?? "no-run-id";

  let line = `[${entry.timestamp}] [${levelStr}] [${runId}] ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }

  return line;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: Required<LoggerOptions> = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId: getRunId(),
      message,
      context,
    };

    for (const sink of opts.sinks) {
      sink(entry);
    }

    if (!opts.console && !opts.file) {
      return;
    }

    const line = formatLogEntry(entry);

    if (opts.console) {
      getConsoleMethod(level)(line);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, line + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
  };
}

/**
 * Create a logger that keeps every entry in memory and prints nothing.
 */
export function createRecordingLogger(level: LogLevel = "debug"): RecordingLogger {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    level,
    console: false,
    file: false,
    sinks: [(entry) => entries.push(entry)],
  });

  return {
    ...logger,
    entries,
    at: (wanted) => entries.filter((entry) => entry.level === wanted),
  };
}
