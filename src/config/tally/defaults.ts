/**
 * Default tally options.
 *
 * Parse errors abort the run; votes for undeclared topics are skipped with a
 * warning.
 */

import type { TallyOptions } from "./schema.js";

export const DEFAULT_TALLY_OPTIONS: TallyOptions = {
  parseMode: "strict",
  unresolvedTopicPolicy: "skip",
  includeUnvotedTopics: false,
  summaryTopN: 10,
  subjectPreviewWidth: 40,
};
