/**
 * Message Parser Tests
 *
 * Run with: node --import tsx src/parser/parser.test.ts
 *
 * These tests verify:
 *   1. Well-formed exports parse into the expected messages
 *   2. Blank lines split messages only between messages
 *   3. Grammar violations raise ParseError with the offending line
 *   4. Lenient mode collects violations and keeps parsing
 *   5. Block splitting is lazy
 */

import { strict as assert } from "node:assert";

import { parseMessages, splitMessageBlocks } from "./index.js";
import { FormatError, ParseError, type ParseErrorReason } from "../errors/index.js";
import { createRecordingLogger } from "../logging/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function text(...lines: string[]): string {
  return lines.join("\n") + "\n";
}

/**
 * Assert that fn throws a ParseError with the given reason and line number.
 */
function assertParseError(fn: () => unknown, reason: ParseErrorReason, line: number): void {
  assert.throws(fn, (err: unknown) => {
    assert.ok(err instanceof ParseError, "expected a ParseError");
    assert.equal(err.reason, reason);
    assert.equal(err.line, line);
    return true;
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const SAMPLE = text(
  "Alice", //                     1
  "9:41 AM", //                   2
  "1-Lunch and learn", //         3
  "2-Code review, guidelines", // 4
  "", //                          5
  ":1:", //                       6
  "5", //                         7
  ":2:", //                       8
  "3", //                         9
  "", //                          10
  "Bob", //                       11
  "10:02 AM", //                  12
  "1-Hackathon", //               13
  ":1:", //                       14
  "8" //                          15
);

// ═══════════════════════════════════════════════════════════════════════════
// WELL-FORMED INPUT
// ═══════════════════════════════════════════════════════════════════════════

section("Well-formed input");

test("parses names, timestamps, declarations and votes", () => {
  const { messages, issues } = parseMessages(SAMPLE);

  assert.equal(messages.length, 2);
  assert.equal(issues.length, 0);

  const [alice, bob] = messages;
  assert.equal(alice?.index, 0);
  assert.equal(alice?.creatorName, "Alice");
  assert.equal(alice?.timestamp, "9:41 AM");
  assert.deepEqual(alice?.declarations, [
    { topicNumber: 1, subject: "Lunch and learn", line: 3 },
    { topicNumber: 2, subject: "Code review, guidelines", line: 4 },
  ]);
  assert.deepEqual(alice?.votes, [
    { topicNumber: 1, votes: 5, line: 6 },
    { topicNumber: 2, votes: 3, line: 8 },
  ]);
  assert.equal(alice?.startLine, 1);
  assert.equal(alice?.endLine, 9);

  assert.equal(bob?.index, 1);
  assert.equal(bob?.creatorName, "Bob");
  assert.deepEqual(bob?.votes, [{ topicNumber: 1, votes: 8, line: 14 }]);
  assert.equal(bob?.startLine, 11);
  assert.equal(bob?.endLine, 15);
});

test("messages are frozen", () => {
  const [message] = parseMessages(SAMPLE).messages;
  assert.equal(Object.isFrozen(message), true);
  assert.equal(Object.isFrozen(message?.votes), true);
  assert.equal(Object.isFrozen(message?.declarations), true);
});

test("timestamp is kept as written, only trimmed", () => {
  const [message] = parseMessages(text("Alice", "  Yesterday at 9:41 AM  ", "1-Lunch")).messages;
  assert.equal(message?.timestamp, "Yesterday at 9:41 AM");
});

test("empty and blank-only input produce no messages", () => {
  assert.deepEqual(parseMessages("").messages, []);
  assert.deepEqual(parseMessages("\n\n   \n").messages, []);
});

test("a vote may name a topic that was never declared", () => {
  const [message] = parseMessages(text("Alice", "9:41 AM", "1-Lunch", ":4:", "2")).messages;
  assert.deepEqual(message?.votes, [{ topicNumber: 4, votes: 2, line: 4 }]);
});

// ═══════════════════════════════════════════════════════════════════════════
// MESSAGE BOUNDARIES
// ═══════════════════════════════════════════════════════════════════════════

section("Message boundaries");

test("blank lines inside a message do not split it", () => {
  const { messages } = parseMessages(
    text("Alice", "9:41 AM", "", "1-Lunch", "2-Demo", "", ":1:", "", "4", "", ":2:", "1", "", "")
  );
  assert.equal(messages.length, 1);
  assert.equal(messages[0]?.declarations.length, 2);
  assert.deepEqual(messages[0]?.votes, [
    { topicNumber: 1, votes: 4, line: 7 },
    { topicNumber: 2, votes: 1, line: 11 },
  ]);
  assert.equal(messages[0]?.endLine, 12);
});

test("leading blank lines are skipped", () => {
  const [message] = parseMessages("\n\n\n" + SAMPLE).messages;
  assert.equal(message?.creatorName, "Alice");
  assert.equal(message?.startLine, 4);
});

test("name followed by a clock time starts a message without a blank line", () => {
  const { messages } = parseMessages(
    text("Alice", "9:41 AM", "1-Lunch", ":1:", "2", "Bob", "9:45 AM", "1-Demo", ":1:", "4")
  );
  assert.deepEqual(
    messages.map((m) => [m.creatorName, m.startLine, m.votes[0]?.votes]),
    [
      ["Alice", 1, 2],
      ["Bob", 6, 4],
    ]
  );
});

test("a message with no topics ends at the next name", () => {
  const { messages } = parseMessages(
    text("Alice", "9:41 AM", "", "Bob", "9:45 AM", "1-Demo", ":1:", "2")
  );
  assert.equal(messages.length, 2);
  assert.equal(messages[0]?.declarations.length, 0);
  assert.equal(messages[0]?.votes.length, 0);
  assert.equal(messages[1]?.creatorName, "Bob");
});

test("topic numbers repeat independently across messages", () => {
  const { messages } = parseMessages(SAMPLE);
  assert.equal(messages[0]?.declarations[0]?.topicNumber, 1);
  assert.equal(messages[1]?.declarations[0]?.topicNumber, 1);
  assert.equal(messages[1]?.declarations[0]?.subject, "Hackathon");
});

test("a declaration after a blank line joins the current message", () => {
  const { messages } = parseMessages(
    text("Alice", "9:41 AM", "1-A", ":1:", "3", "", "2-B", ":2:", "4")
  );
  assert.equal(messages.length, 1);
  assert.equal(messages[0]?.creatorName, "Alice");
  assert.deepEqual(messages[0]?.declarations, [
    { topicNumber: 1, subject: "A", line: 3 },
    { topicNumber: 2, subject: "B", line: 7 },
  ]);
  assert.deepEqual(messages[0]?.votes, [
    { topicNumber: 1, votes: 3, line: 4 },
    { topicNumber: 2, votes: 4, line: 8 },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// STRICT MODE ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Strict mode errors");

test("non-numeric vote count names its own line", () => {
  assertParseError(
    () => parseMessages(text("Alice", "9:41 AM", "1-Lunch", "2-Demo", ":2:", "lots")),
    "invalid_vote_count",
    6
  );
});

test("ParseError message and context locate the line", () => {
  try {
    parseMessages(text("Alice", "9:41 AM", "1-Lunch", ":1:", "  many "));
    assert.fail("Should have thrown");
  } catch (err) {
    if (!(err instanceof ParseError)) throw err;
    assert.equal(err.kind, "parse");
    assert.equal(err.content, "  many ");
    assert.deepEqual(err.context, {
      reason: "invalid_vote_count",
      line: 5,
      content: "  many ",
    });
    assert.equal(
      err.message,
      'Line 5: Vote count for topic 1 (marker on line 4) is not a non-negative integer: "many"'
    );
  }
});

test("unrecognized line among declarations", () => {
  assertParseError(
    () => parseMessages(text("Alice", "9:41 AM", "1-Lunch", "Lunch again?", ":1:", "3")),
    "unrecognized_topic_line",
    4
  );
});

const LATE_DECLARATIONS = text(
  "Alice", //  1
  "9:41 AM", // 2
  "1-A", //    3
  ":1:", //    4
  "3", //      5
  "", //       6
  "2-B", //    7
  ":2:", //    8
  "4-C", //    9
  ":1:", //    10
  "5" //       11
);

test("declaration in place of a count is an invalid count, not a new message", () => {
  assertParseError(() => parseMessages(LATE_DECLARATIONS), "invalid_vote_count", 9);
});

test("stray line in the vote section", () => {
  assertParseError(
    () => parseMessages(text("Alice", "9:41 AM", "1-Lunch", ":1:", "3", "oops")),
    "unexpected_line",
    6
  );
});

test("marker at end of input has no count", () => {
  assertParseError(
    () => parseMessages(text("Alice", "9:41 AM", "1-Lunch", ":1:", "")),
    "missing_vote_count",
    4
  );
});

test("name at end of input is a FormatError", () => {
  assert.throws(
    () => parseMessages(text(...SAMPLE.trimEnd().split("\n"), "", "Carol")),
    (err: unknown) =>
      err instanceof FormatError &&
      err instanceof ParseError &&
      err.reason === "truncated_message" &&
      err.line === 17 &&
      err.message === 'Line 17: Input ends after the name "Carol" with no timestamp'
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// LENIENT MODE
// ═══════════════════════════════════════════════════════════════════════════

section("Lenient mode");

test("invalid count drops the vote and parsing continues", () => {
  const logger = createRecordingLogger();
  const { messages, issues } = parseMessages(
    text("Alice", "9:41 AM", "1-Lunch", "2-Demo", ":1:", "many", ":2:", "3"),
    { mode: "lenient", logger }
  );

  assert.equal(messages.length, 1);
  assert.deepEqual(messages[0]?.votes, [{ topicNumber: 2, votes: 3, line: 7 }]);
  assert.equal(issues.length, 1);
  assert.equal(issues[0]?.line, 6);
  assert.equal(logger.at("warn").length, 1);
  assert.deepEqual(logger.at("warn")[0]?.context, {
    reason: "invalid_vote_count",
    line: 6,
    content: "many",
  });
});

test("marker in place of a count is read as the next marker", () => {
  const { messages, issues } = parseMessages(
    text("Alice", "9:41 AM", "1-Lunch", "2-Demo", ":1:", ":2:", "4"),
    { mode: "lenient" }
  );
  assert.deepEqual(messages[0]?.votes, [{ topicNumber: 2, votes: 4, line: 6 }]);
  assert.deepEqual(
    issues.map((i) => [i.reason, i.line]),
    [["invalid_vote_count", 6]]
  );
});

test("declaration in place of a count is kept as a declaration", () => {
  const { messages, issues } = parseMessages(LATE_DECLARATIONS, { mode: "lenient" });

  assert.deepEqual(
    messages.map((m) => m.creatorName),
    ["Alice"]
  );
  assert.deepEqual(
    messages[0]?.declarations.map((d) => [d.topicNumber, d.subject]),
    [
      [1, "A"],
      [2, "B"],
      [4, "C"],
    ]
  );
  assert.deepEqual(
    messages[0]?.votes.map((v) => [v.topicNumber, v.votes, v.line]),
    [
      [1, 3, 4],
      [1, 5, 10],
    ]
  );
  assert.deepEqual(
    issues.map((i) => [i.reason, i.line]),
    [["invalid_vote_count", 9]]
  );
});

test("truncated final message is dropped", () => {
  const { messages, issues } = parseMessages(
    text("Alice", "9:41 AM", "1-A", ":1:", "2", "", "Bob"),
    { mode: "lenient" }
  );
  assert.equal(messages.length, 1);
  assert.equal(issues.length, 1);
  assert.ok(issues[0] instanceof FormatError);
  assert.equal(issues[0]?.line, 7);
});

// ═══════════════════════════════════════════════════════════════════════════
// BLOCK SPLITTING
// ═══════════════════════════════════════════════════════════════════════════

section("Block splitting");

test("blocks cover each message's lines without trailing blanks", () => {
  const blocks = [...splitMessageBlocks(SAMPLE)];
  assert.deepEqual(
    blocks.map((b) => [b.index, b.startLine, b.endLine, b.lines.length]),
    [
      [0, 1, 9, 9],
      [1, 11, 15, 5],
    ]
  );
  assert.equal(blocks[0]?.lines[4]?.kind, "blank");
});

test("blocks are produced lazily", () => {
  const input = SAMPLE + text("Carol", "10:05 AM", "not a topic");
  const blocks = splitMessageBlocks(input);
  const nextIndex = (): number | undefined => {
    const result = blocks.next();
    return result.done ? undefined : result.value.index;
  };

  assert.equal(nextIndex(), 0);
  assert.equal(nextIndex(), 1);
  assertParseError(nextIndex, "unrecognized_topic_line", 18);
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n=== Results: ${passed} passed, ${failed} failed ===\n`);

if (failed > 0) {
  process.exit(1);
}
