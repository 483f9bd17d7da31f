/**
 * Message scanner.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * STATE MACHINE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   expect_name ─► expect_timestamp ─► collect_declarations ─► collect_votes
 *        ▲                                                      │      ▲
 *        │                                                      ▼      │
 *        └────────────── next message ◄──────────────────── await_count
 *
 *   expect_name           first non-blank line is the creator's name
 *   expect_timestamp      next non-blank line, kept verbatim
 *   collect_declarations  `N-subject` lines; a blank line or `:N:` moves on
 *   collect_votes         `:N:` markers; late declarations are still accepted
 *   await_count           next non-blank line must be the count for the marker
 *
 * A message ends at a plain text or count line that either follows a
 * blank-line run or is followed by a clock-time line (the sender name / time
 * header of a chat export). Declaration and `:N:` lines never start a
 * message. Blank lines anywhere else are ignored, so they never split a
 * message.
 *
 * The scanner is a generator: blocks and messages are produced one at a time
 * in a single pass over the input.
 */

import type { Message, TopicDeclaration, VoteEntry } from "../types/index.js";
import type { ParseMode } from "../config/tally/index.js";
import { FormatError, ParseError } from "../errors/index.js";
import {
  splitLines,
  parseCount,
  parseDeclaration,
  parseVoteMarker,
  TIMESTAMP_HINT_PATTERN,
  type SourceLine,
} from "./lines.js";

/**
 * The source lines one message was built from.
 * Leading and trailing blank lines are not part of a block.
 */
export interface MessageBlock {
  readonly index: number;
  readonly startLine: number;
  readonly endLine: number;
  readonly lines: readonly SourceLine[];
}

export interface ScannedMessage {
  readonly block: MessageBlock;
  readonly message: Message;
}

export interface ScanOptions {
  /** Default: "strict" */
  mode?: ParseMode;
  /** Receives each grammar violation in lenient mode */
  onIssue?: (issue: ParseError) => void;
}

class MessageDraft {
  private readonly index: number;
  private readonly nameLine: SourceLine;
  private readonly lines: SourceLine[];
  private pendingBlanks: SourceLine[] = [];
  private timestamp = "";
  private readonly declarations: TopicDeclaration[] = [];
  private readonly votes: VoteEntry[] = [];

  constructor(index: number, nameLine: SourceLine) {
    this.index = index;
    this.nameLine = nameLine;
    this.lines = [nameLine];
  }

  get creatorName(): string {
    return this.nameLine.text;
  }

  get nameLineNumber(): number {
    return this.nameLine.number;
  }

  get nameLineRaw(): string {
    return this.nameLine.raw;
  }

  /**
   * Attach a line to this message's block. Blank lines are held back until a
   * later non-blank line joins the block, so trailing blanks are never kept.
   */
  take(line: SourceLine): void {
    if (line.kind === "blank") {
      this.pendingBlanks.push(line);
      return;
    }
    this.lines.push(...this.pendingBlanks, line);
    this.pendingBlanks = [];
  }

  setTimestamp(line: SourceLine): void {
    this.take(line);
    this.timestamp = line.text;
  }

  declare(line: SourceLine, topicNumber: number, subject: string): void {
    this.take(line);
    this.declarations.push(Object.freeze({ topicNumber, subject, line: line.number }));
  }

  vote(countLine: SourceLine, topicNumber: number, votes: number, markerLine: number): void {
    this.take(countLine);
    this.votes.push(Object.freeze({ topicNumber, votes, line: markerLine }));
  }

  build(): ScannedMessage {
    const startLine = this.nameLine.number;
    const endLine = this.lines[this.lines.length - 1]?.number ?? startLine;

    const message: Message = Object.freeze({
      index: this.index,
      creatorName: this.nameLine.text,
      timestamp: this.timestamp,
      declarations: Object.freeze([...this.declarations]),
      votes: Object.freeze([...this.votes]),
      startLine,
      endLine,
    });

    const block: MessageBlock = Object.freeze({
      index: this.index,
      startLine,
      endLine,
      lines: Object.freeze([...this.lines]),
    });

    return { block, message };
  }
}

type ScannerState =
  | { phase: "expect_name" }
  | { phase: "expect_timestamp"; draft: MessageDraft }
  | { phase: "collect_declarations"; draft: MessageDraft }
  | { phase: "collect_votes"; draft: MessageDraft; afterBlank: boolean }
  | {
      phase: "await_count";
      draft: MessageDraft;
      marker: SourceLine;
      topicNumber: number;
      afterBlank: boolean;
    };

/**
 * Whether a line can be the creator name that opens the next message.
 */
function isNameCandidate(line: SourceLine): boolean {
  return line.kind === "text" || line.kind === "count";
}

/**
 * Whether the next non-blank line after `index` looks like a clock time.
 */
function followedByTimestamp(lines: readonly SourceLine[], index: number): boolean {
  for (let j = index + 1; j < lines.length; j++) {
    const next = lines[j];
    if (next === undefined) {
      break;
    }
    if (next.kind !== "blank") {
      return TIMESTAMP_HINT_PATTERN.test(next.text);
    }
  }
  return false;
}

/**
 * Scan raw file text into message blocks and their parsed messages.
 *
 * @throws ParseError on the first grammar violation in strict mode
 */
export function* scanMessages(
  text: string,
  options: ScanOptions = {}
): Generator<ScannedMessage, void, undefined> {
  const mode = options.mode ?? "strict";
  const lines = splitLines(text);

  const report = (issue: ParseError): void => {
    if (mode === "strict") {
      throw issue;
    }
    options.onIssue?.(issue);
  };

  let state: ScannerState = { phase: "expect_name" };
  let nextIndex = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (line === undefined) {
      break;
    }

    // Set when a line ends one phase and must be read again by the next
    let reprocess = true;
    while (reprocess) {
      reprocess = false;

      switch (state.phase) {
        case "expect_name": {
          if (line.kind !== "blank") {
            state = { phase: "expect_timestamp", draft: new MessageDraft(nextIndex++, line) };
          }
          break;
        }

        case "expect_timestamp": {
          if (line.kind !== "blank") {
            state.draft.setTimestamp(line);
            state = { phase: "collect_declarations", draft: state.draft };
          }
          break;
        }

        case "collect_declarations": {
          const { draft }: { draft: MessageDraft } = state;

          if (line.kind === "blank") {
            draft.take(line);
            state = { phase: "collect_votes", draft, afterBlank: true };
            break;
          }

          if (line.kind === "vote_marker") {
            state = { phase: "collect_votes", draft, afterBlank: false };
            reprocess = true;
            break;
          }

          const declaration = line.kind === "declaration" ? parseDeclaration(line.text) : null;
          if (declaration) {
            draft.declare(line, declaration.topicNumber, declaration.subject);
            break;
          }

          if (isNameCandidate(line) && followedByTimestamp(lines, i)) {
            yield draft.build();
            state = { phase: "expect_name" };
            reprocess = true;
            break;
          }

          report(
            new ParseError(
              "unrecognized_topic_line",
              `Unrecognized topic line "${line.text}" in message from ${draft.creatorName}`,
              line.number,
              line.raw
            )
          );
          draft.take(line);
          break;
        }

        case "collect_votes": {
          const { draft }: { draft: MessageDraft } = state;

          if (line.kind === "blank") {
            draft.take(line);
            state = { phase: "collect_votes", draft, afterBlank: true };
            break;
          }

          if (line.kind === "vote_marker") {
            const topicNumber = parseVoteMarker(line.text);
            if (topicNumber === null) {
              report(
                new ParseError(
                  "unexpected_line",
                  `Topic number out of range in "${line.text}"`,
                  line.number,
                  line.raw
                )
              );
              draft.take(line);
              state = { phase: "collect_votes", draft, afterBlank: false };
              break;
            }
            draft.take(line);
            state = { phase: "await_count", draft, marker: line, topicNumber, afterBlank: false };
            break;
          }

          if (line.kind === "declaration") {
            const declaration = parseDeclaration(line.text);
            if (declaration) {
              draft.declare(line, declaration.topicNumber, declaration.subject);
              state = { phase: "collect_votes", draft, afterBlank: false };
              break;
            }
          }

          if (isNameCandidate(line) && (state.afterBlank || followedByTimestamp(lines, i))) {
            yield draft.build();
            state = { phase: "expect_name" };
            reprocess = true;
            break;
          }

          report(
            new ParseError(
              "unexpected_line",
              `Unexpected line "${line.text}" in vote section of message from ${draft.creatorName}`,
              line.number,
              line.raw
            )
          );
          draft.take(line);
          break;
        }

        case "await_count": {
          const awaiting: Extract<ScannerState, { phase: "await_count" }> = state;
          const { draft, marker, topicNumber, afterBlank } = awaiting;

          if (line.kind === "blank") {
            draft.take(line);
            state = { ...awaiting, afterBlank: true };
            break;
          }

          const votes = line.kind === "count" ? parseCount(line.text) : null;
          if (votes !== null) {
            draft.vote(line, topicNumber, votes, marker.number);
            state = { phase: "collect_votes", draft, afterBlank: false };
            break;
          }

          report(
            new ParseError(
              "invalid_vote_count",
              `Vote count for topic ${topicNumber} (marker on line ${marker.number}) is not a non-negative integer: "${line.text}"`,
              line.number,
              line.raw
            )
          );

          // Lenient: the vote is dropped. Grammar lines and message boundaries
          // are read again by the vote section; other lines are skipped.
          state = { phase: "collect_votes", draft, afterBlank };
          if (
            line.kind === "vote_marker" ||
            line.kind === "declaration" ||
            afterBlank ||
            followedByTimestamp(lines, i)
          ) {
            reprocess = true;
          } else {
            draft.take(line);
          }
          break;
        }
      }
    }
  }

  switch (state.phase) {
    case "expect_name":
      return;

    case "expect_timestamp": {
      const { draft } = state;
      report(
        new FormatError(
          `Input ends after the name "${draft.creatorName}" with no timestamp`,
          draft.nameLineNumber,
          draft.nameLineRaw
        )
      );
      return;
    }

    case "await_count": {
      const { marker, topicNumber } = state;
      report(
        new ParseError(
          "missing_vote_count",
          `Input ends before the vote count for topic ${topicNumber}`,
          marker.number,
          marker.raw
        )
      );
      yield state.draft.build();
      return;
    }

    default:
      yield state.draft.build();
  }
}

/**
 * Split raw file text into message blocks, lazily and in one pass.
 *
 * @throws ParseError on the first grammar violation in strict mode
 */
export function* splitMessageBlocks(
  text: string,
  options: ScanOptions = {}
): Generator<MessageBlock, void, undefined> {
  for (const { block } of scanMessages(text, options)) {
    yield block;
  }
}
