/**
 * Aggregator.
 *
 * Flattens parsed messages into result rows. Topic numbers are scoped to
 * their message: each vote is joined to a declaration of the same number in
 * the same message, never across creators.
 *
 * Within one message a repeated declaration replaces the earlier subject and
 * a repeated vote entry replaces the earlier count. A replaced vote keeps the
 * row position of its first occurrence.
 */

import type { Message, ResultRow, VoteEntry } from "../types/index.js";
import type { UnresolvedTopicPolicy } from "../config/tally/index.js";
import { UnresolvedTopicError } from "../errors/index.js";
import type { Logger } from "../logging/index.js";

export interface AggregateOptions {
  /** Default: "skip" */
  unresolvedTopicPolicy?: UnresolvedTopicPolicy;
  /** Emit 0-vote rows for declared topics without a vote entry. Default: false */
  includeUnvotedTopics?: boolean;
  logger?: Logger;
}

export interface AggregateResult {
  /** Message order, then vote order within each message */
  rows: ResultRow[];
  /** Votes skipped under the "skip" policy */
  unresolved: UnresolvedTopicError[];
}

function collectSubjects(message: Message, logger?: Logger): Map<number, string> {
  const subjects = new Map<number, string>();
  for (const declaration of message.declarations) {
    const previous = subjects.get(declaration.topicNumber);
    if (previous !== undefined) {
      logger?.debug("Topic redeclared, later subject wins", {
        creatorName: message.creatorName,
        topicNumber: declaration.topicNumber,
        previous,
        subject: declaration.subject,
        line: declaration.line,
      });
    }
    subjects.set(declaration.topicNumber, declaration.subject);
  }
  return subjects;
}

function collectVotes(message: Message, logger?: Logger): Map<number, VoteEntry> {
  const tallies = new Map<number, VoteEntry>();
  for (const entry of message.votes) {
    const previous = tallies.get(entry.topicNumber);
    if (previous !== undefined) {
      logger?.debug("Repeated vote entry, later count wins", {
        creatorName: message.creatorName,
        topicNumber: entry.topicNumber,
        previous: previous.votes,
        votes: entry.votes,
        line: entry.line,
      });
    }
    tallies.set(entry.topicNumber, entry);
  }
  return tallies;
}

/**
 * Join the vote entries of each message to its topic declarations.
 *
 * @throws UnresolvedTopicError under the "fail" policy
 */
export function aggregate(
  messages: Iterable<Message>,
  options: AggregateOptions = {}
): AggregateResult {
  const { unresolvedTopicPolicy = "skip", includeUnvotedTopics = false, logger } = options;
  const rows: ResultRow[] = [];
  const unresolved: UnresolvedTopicError[] = [];

  for (const message of messages) {
    const subjects = collectSubjects(message, logger);
    const tallies = collectVotes(message, logger);

    for (const entry of tallies.values()) {
      const subject = subjects.get(entry.topicNumber);

      if (subject === undefined) {
        const error = new UnresolvedTopicError({
          creatorName: message.creatorName,
          topicNumber: entry.topicNumber,
          messageIndex: message.index,
          line: entry.line,
        });
        if (unresolvedTopicPolicy === "fail") {
          throw error;
        }
        logger?.warn(`Skipping vote: ${error.message}`, { ...error.context });
        unresolved.push(error);
        continue;
      }

      rows.push(
        Object.freeze({
          creatorName: message.creatorName,
          topicNumber: entry.topicNumber,
          votes: entry.votes,
          subject,
        })
      );
    }

    if (includeUnvotedTopics) {
      for (const [topicNumber, subject] of subjects) {
        if (!tallies.has(topicNumber)) {
          rows.push(Object.freeze({ creatorName: message.creatorName, topicNumber, votes: 0, subject }));
        }
      }
    }
  }

  return { rows, unresolved };
}
