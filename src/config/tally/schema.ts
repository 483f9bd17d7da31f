/**
 * Tally options schema definition.
 *
 * Options are validated once per run and frozen, so every stage of the
 * pipeline sees the same policies.
 */

import { z } from "zod";
import { ParseMode, UnresolvedTopicPolicy } from "./enums.js";

export const TallyOptionsSchema = z
  .object({
    parseMode: ParseMode.describe(
      "Whether grammar violations abort the run or are collected as issues"
    ),

    unresolvedTopicPolicy: UnresolvedTopicPolicy.describe(
      "Whether a vote for an undeclared topic is skipped with a warning or aborts the run"
    ),

    /** Emit zero-vote rows for declared topics that received no vote entry */
    includeUnvotedTopics: z
      .boolean()
      .describe("Emit rows with 0 votes for declared topics without a vote entry"),

    summaryTopN: z
      .number()
      .int()
      .min(1)
      .describe("Number of rows shown in the printed summary table"),

    subjectPreviewWidth: z
      .number()
      .int()
      .min(4)
      .describe("Subjects longer than this are truncated in the summary table"),
  })
  .strict();

export type TallyOptions = z.infer<typeof TallyOptionsSchema>;
