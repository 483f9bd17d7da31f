/**
 * Parser module.
 *
 * Turns the text of a voting export into immutable Message records:
 *
 *   splitLines()          classify every line once
 *   scanMessages()        state machine, one message at a time
 *   splitMessageBlocks()  the source lines of each message
 *   parseMessages()       all messages plus lenient-mode issues
 */

export {
  splitLines,
  classifyLine,
  parseCount,
  parseDeclaration,
  parseVoteMarker,
  DECLARATION_PATTERN,
  VOTE_MARKER_PATTERN,
  COUNT_PATTERN,
  TIMESTAMP_HINT_PATTERN,
  type SourceLine,
  type LineKind,
} from "./lines.js";

export {
  scanMessages,
  splitMessageBlocks,
  type MessageBlock,
  type ScannedMessage,
  type ScanOptions,
} from "./scanner.js";

export { parseMessages, type ParseOptions, type ParseResult } from "./parser.js";
