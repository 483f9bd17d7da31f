/**
 * Line tokenizer for voting message exports.
 *
 * Every line is trimmed and classified once; the scanner only ever looks at
 * `kind` and `text`.
 */

export type LineKind = "blank" | "declaration" | "vote_marker" | "count" | "text";

export interface SourceLine {
  /** 1-based line number */
  readonly number: number;
  /** Line as written, without its terminator */
  readonly raw: string;
  /** Line with surrounding whitespace removed */
  readonly text: string;
  readonly kind: LineKind;
}

/** `N-subject`; only the first `-` separates number and subject */
export const DECLARATION_PATTERN = /^(\d+)-(.*)$/;

/** `:N:` on a line of its own */
export const VOTE_MARKER_PATTERN = /^:(\d+):$/;

/** A vote count */
export const COUNT_PATTERN = /^\d+$/;

/** Clock times such as "9:41 AM" that follow a sender's name in chat exports */
export const TIMESTAMP_HINT_PATTERN = /^\d{1,2}:\d{2}\s*(AM|PM)\b/i;

export function classifyLine(text: string): LineKind {
  if (text === "") return "blank";
  if (VOTE_MARKER_PATTERN.test(text)) return "vote_marker";
  if (COUNT_PATTERN.test(text)) return "count";
  if (DECLARATION_PATTERN.test(text)) return "declaration";
  return "text";
}

/**
 * Split raw file text into classified lines.
 * Accepts LF and CRLF terminators and drops a leading byte order mark.
 * A final terminator does not produce an extra line.
 */
export function splitLines(text: string): SourceLine[] {
  const body = text.startsWith("\uFEFF") ? text.slice(1) : text;
  if (body === "") {
    return [];
  }

  const rawLines = body.split(/\r?\n/);
  if (rawLines[rawLines.length - 1] === "") {
    rawLines.pop();
  }

  return rawLines.map((raw, i) => {
    const trimmed = raw.trim();
    return { number: i + 1, raw, text: trimmed, kind: classifyLine(trimmed) };
  });
}

/**
 * Parse a non-negative base-10 integer.
 * Returns null for anything else, including values beyond the safe integer range.
 */
export function parseCount(text: string): number | null {
  const trimmed = text.trim();
  if (!COUNT_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Split a declaration line into its topic number and trimmed subject.
 */
export function parseDeclaration(text: string): { topicNumber: number; subject: string } | null {
  const match = DECLARATION_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  const topicNumber = parseCount(match[1] ?? "");
  if (topicNumber === null) {
    return null;
  }
  return { topicNumber, subject: (match[2] ?? "").trim() };
}

/**
 * Extract the topic number from a `:N:` line.
 */
export function parseVoteMarker(text: string): number | null {
  const match = VOTE_MARKER_PATTERN.exec(text);
  return match ? parseCount(match[1] ?? "") : null;
}
