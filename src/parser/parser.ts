/**
 * Message parser.
 *
 * Collects the scanner's output into an array of messages. In lenient mode
 * grammar violations are gathered as issues and logged at warning level
 * instead of aborting the parse.
 */

import type { Message } from "../types/index.js";
import type { ParseMode } from "../config/tally/index.js";
import type { ParseError } from "../errors/index.js";
import type { Logger } from "../logging/index.js";
import { scanMessages } from "./scanner.js";

export interface ParseOptions {
  /** Default: "strict" */
  mode?: ParseMode;
  logger?: Logger;
}

export interface ParseResult {
  messages: Message[];
  /** Grammar violations skipped in lenient mode; always empty in strict mode */
  issues: ParseError[];
}

/**
 * Parse raw file text into messages.
 *
 * @example
 *   const { messages } = parseMessages("Alice\n9:00 AM\n1-Lunch\n:1:\n4\n");
 *   // messages[0].votes → [{ topicNumber: 1, votes: 4, line: 4 }]
 *
 * @throws ParseError on the first grammar violation in strict mode
 */
export function parseMessages(text: string, options: ParseOptions = {}): ParseResult {
  const { mode = "strict", logger } = options;
  const messages: Message[] = [];
  const issues: ParseError[] = [];

  const scanned = scanMessages(text, {
    mode,
    onIssue: (issue) => {
      issues.push(issue);
      logger?.warn(`Skipping malformed input: ${issue.message}`, { ...issue.context });
    },
  });

  for (const { message } of scanned) {
    messages.push(message);
    logger?.debug("Parsed message", {
      index: message.index,
      creatorName: message.creatorName,
      declarations: message.declarations.length,
      votes: message.votes.length,
      startLine: message.startLine,
    });
  }

  return { messages, issues };
}
