/**
 * Structured errors raised by a tally run.
 *
 * Every error carries a `kind` for programmatic handling and a flat context
 * record (line numbers, paths, topic numbers) that goes straight into a log
 * entry or the CLI's error output.
 */

export type TallyErrorKind =
  | "file_access"
  | "parse"
  | "unresolved_topic"
  | "output_write";

export type ErrorContext = Readonly<Record<string, string | number>>;

export class TallyError extends Error {
  public readonly kind: TallyErrorKind;
  public readonly context: ErrorContext;

  constructor(
    kind: TallyErrorKind,
    message: string,
    context: ErrorContext,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TallyError";
    this.kind = kind;
    this.context = context;
  }

  /**
   * Format the error and its context for display.
   */
  format(): string {
    const lines = [`${this.name}: ${this.message}`];
    for (const [key, value] of Object.entries(this.context)) {
      lines.push(`  ${key}: ${value}`);
    }
    return lines.join("\n");
  }
}

/**
 * Extract the errno code (ENOENT, EACCES, ...) from a filesystem failure.
 */
function errorCode(cause: unknown): string {
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return "UNKNOWN";
}

function errorReason(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * The input file is missing or unreadable.
 */
export class FileAccessError extends TallyError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(
      "file_access",
      `Cannot read input file ${path}: ${errorReason(cause)}`,
      { path, code: errorCode(cause) },
      { cause }
    );
    this.name = "FileAccessError";
    this.path = path;
  }
}

export type ParseErrorReason =
  | "unrecognized_topic_line"
  | "unexpected_line"
  | "invalid_vote_count"
  | "missing_vote_count"
  | "truncated_message";

/**
 * A line violates the message grammar.
 */
export class ParseError extends TallyError {
  public readonly reason: ParseErrorReason;
  /** 1-based line number */
  public readonly line: number;
  /** The offending line as it appears in the input */
  public readonly content: string;

  constructor(reason: ParseErrorReason, message: string, line: number, content: string) {
    super("parse", `Line ${line}: ${message}`, { reason, line, content });
    this.name = "ParseError";
    this.reason = reason;
    this.line = line;
    this.content = content;
  }
}

/**
 * The input ended in the middle of a message (a name with no timestamp).
 */
export class FormatError extends ParseError {
  constructor(message: string, line: number, content: string) {
    super("truncated_message", message, line, content);
    this.name = "FormatError";
  }
}

export interface UnresolvedTopicDetails {
  creatorName: string;
  topicNumber: number;
  /** 0-based position of the message in the input */
  messageIndex: number;
  /** Line of the `:N:` marker */
  line: number;
}

/**
 * A vote references a topic number never declared in its message.
 */
export class UnresolvedTopicError extends TallyError {
  public readonly details: Readonly<UnresolvedTopicDetails>;

  constructor(details: UnresolvedTopicDetails) {
    super(
      "unresolved_topic",
      `Vote for topic ${details.topicNumber} by ${details.creatorName} has no matching declaration`,
      {
        creatorName: details.creatorName,
        topicNumber: details.topicNumber,
        messageIndex: details.messageIndex,
        line: details.line,
      }
    );
    this.name = "UnresolvedTopicError";
    this.details = Object.freeze({ ...details });
  }
}

/**
 * The CSV destination cannot be written.
 */
export class OutputWriteError extends TallyError {
  public readonly path: string;

  constructor(path: string, cause: unknown) {
    super(
      "output_write",
      `Cannot write output file ${path}: ${errorReason(cause)}`,
      { path, code: errorCode(cause) },
      { cause }
    );
    this.name = "OutputWriteError";
    this.path = path;
  }
}
