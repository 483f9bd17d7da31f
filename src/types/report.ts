/**
 * Report definitions.
 */

/**
 * One (creator, topic) pair with its vote count.
 */
export interface ResultRow {
  readonly creatorName: string;
  readonly topicNumber: number;
  readonly votes: number;
  readonly subject: string;
}

export interface SummaryStats {
  readonly messageCount: number;
  readonly totalRows: number;
  readonly totalVotes: number;
  /** First row with the highest vote count, null when there are no rows */
  readonly topRow: ResultRow | null;
  readonly distinctCreators: number;
  /** Distinct (creator, topic number) pairs */
  readonly distinctTopics: number;
  /** Votes dropped because their topic was never declared */
  readonly skippedVotes: number;
}
