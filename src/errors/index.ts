/**
 * Error taxonomy for tally runs.
 */

export {
  TallyError,
  FileAccessError,
  ParseError,
  FormatError,
  UnresolvedTopicError,
  OutputWriteError,
  type TallyErrorKind,
  type ErrorContext,
  type ParseErrorReason,
  type UnresolvedTopicDetails,
} from "./errors.js";
