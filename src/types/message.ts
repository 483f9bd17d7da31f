/**
 * Parsed message definitions.
 * A message is one voter's submission: a name, a timestamp, the topics the
 * voter numbered and the vote counts recorded against those numbers.
 */

export interface TopicDeclaration {
  readonly topicNumber: number;
  readonly subject: string;
  /** 1-based source line */
  readonly line: number;
}

export interface VoteEntry {
  readonly topicNumber: number;
  readonly votes: number;
  /** 1-based line of the `:N:` marker */
  readonly line: number;
}

export interface Message {
  /** 0-based position in the input */
  readonly index: number;
  readonly creatorName: string;
  /** Stored verbatim, never interpreted as a time */
  readonly timestamp: string;
  readonly declarations: readonly TopicDeclaration[];
  readonly votes: readonly VoteEntry[];
  readonly startLine: number;
  readonly endLine: number;
}
