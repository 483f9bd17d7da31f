#!/usr/bin/env node
/**
 * CLI command to tally votes from a voting message export.
 *
 * Reads the export, writes one CSV row per (creator, topic) sorted by votes,
 * and prints a summary.
 *
 * Usage:
 *   npm run tally -- --topics-file messages.txt [options]
 *
 * Options:
 *   --topics-file <path>  Text file containing the voting messages (required;
 *                         --topics_file is accepted too)
 *   --output <path>       CSV file to write (default: $TALLY_OUTPUT or voting_results.csv)
 *   -v, --verbose         Enable debug logging
 *   --strict              Abort when a vote references an undeclared topic
 *   --lenient             Skip malformed lines instead of aborting
 *   --include-unvoted     Emit 0-vote rows for declared topics without votes
 *   --top <n>             Rows shown in the summary table (default: 10)
 *   --json                Print the summary as JSON
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - CSV written
 *   1 - Usage, configuration, input, parse or output error
 */

import { parseArgs } from "node:util";

import {
  loadConfig,
  ConfigError,
  TallyOptionsError,
  type AppConfig,
} from "../config/index.js";
import { TallyError } from "../errors/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { tallyFile } from "../pipeline/index.js";
import { formatSummary } from "../report/index.js";

const USAGE = `
Usage: tally-votes --topics-file <path> [options]

Options:
  --topics-file <path>  Text file containing the voting messages (required;
                        --topics_file is accepted too)
  --output <path>       CSV file to write (default: $TALLY_OUTPUT or voting_results.csv)
  -v, --verbose         Enable debug logging
  --strict              Abort when a vote references an undeclared topic
  --lenient             Skip malformed lines instead of aborting
  --include-unvoted     Emit 0-vote rows for declared topics without votes
  --top <n>             Rows shown in the summary table (default: 10)
  --json                Print the summary as JSON
  -h, --help            Show this help message
`;

function parseCliArgs(argv: readonly string[]) {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      "topics-file": { type: "string" },
      // Underscore spelling of --topics-file
      topics_file: { type: "string" },
      output: { type: "string" },
      verbose: { type: "boolean", short: "v", default: false },
      strict: { type: "boolean", default: false },
      lenient: { type: "boolean", default: false },
      "include-unvoted": { type: "boolean", default: false },
      top: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
  return values;
}

/**
 * Run the CLI and return its exit code.
 */
export function runCli(argv: readonly string[]): number {
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    return 1;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const inputPath = args["topics-file"] ?? args.topics_file;
  if (!inputPath) {
    console.error("Error: --topics-file is required");
    console.error("  Usage: tally-votes --topics-file <path> [--output <path>]");
    return 1;
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const runId = initRunId();
  // --json keeps stdout for the report; warnings still reach stderr
  const logger = createLogger({
    level: args.json ? "warn" : args.verbose ? "debug" : config.logLevel,
    logDir: config.logDir,
    file: config.logToFile,
  });

  const outputPath = args.output ?? config.outputPath;
  logger.info("Tally starting", { runId, input: inputPath, output: outputPath });

  try {
    const report = tallyFile(inputPath, outputPath, {
      logger,
      parseMode: args.lenient ? "lenient" : undefined,
      unresolvedTopicPolicy: args.strict ? "fail" : undefined,
      includeUnvotedTopics: args["include-unvoted"] ? true : undefined,
      summaryTopN: args.top === undefined ? undefined : Number(args.top),
    });

    if (args.json) {
      console.log(JSON.stringify({ output: outputPath, summary: report.summary }, null, 2));
    } else {
      console.log("");
      console.log(
        formatSummary(report.summary, report.rows, {
          topN: report.options.summaryTopN,
          subjectWidth: report.options.subjectPreviewWidth,
        })
      );
      console.log("");
      console.log(`Results saved to ${outputPath}`);
    }
    return 0;
  } catch (err) {
    if (err instanceof TallyOptionsError) {
      logger.error("Invalid options", { issues: err.issues.length });
      console.error(err.format());
      return 1;
    }
    if (err instanceof TallyError) {
      logger.error(err.message, { kind: err.kind, ...err.context });
      console.error(err.format());
      return 1;
    }
    throw err;
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("tally-votes.ts") ||
   process.argv[1].endsWith("tally-votes.js") ||
   process.argv[1].endsWith("tally-votes"));

if (isDirectExecution) {
  try {
    process.exit(runCli(process.argv.slice(2)));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Unexpected error: ${message}`);
    process.exit(1);
  }
}
