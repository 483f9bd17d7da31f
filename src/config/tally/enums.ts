/**
 * Policy enums for a tally run.
 */

import { z } from "zod";

/**
 * How grammar violations in the input are handled.
 * - strict: the first violation aborts the run
 * - lenient: violations are collected and logged, the offending line is skipped
 */
export const ParseMode = z.enum(["strict", "lenient"]);

export type ParseMode = z.infer<typeof ParseMode>;

/**
 * What happens to a vote whose topic number has no declaration in its message.
 * - skip: drop the vote and log a warning
 * - fail: abort the run
 */
export const UnresolvedTopicPolicy = z.enum(["skip", "fail"]);

export type UnresolvedTopicPolicy = z.infer<typeof UnresolvedTopicPolicy>;
