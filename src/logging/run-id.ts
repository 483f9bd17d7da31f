/**
 * Run ID generation and management.
 * Each tally invocation gets a run ID so log lines from one run can be grouped.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique run ID.
 * Format: UTC date and time prefix + random suffix (e.g., "20240115-093012-a1b2c3")
 */
export function generateRunId(now: Date = new Date()): string {
  const iso = now.toISOString();
  const datePart = iso.slice(0, 10).replace(/-/g, "");
  const timePart = iso.slice(11, 19).replace(/:/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${timePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize a new run ID for this execution.
 * Called once by the CLI before anything is logged.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/**
 * Get the current run ID, or null before initRunId() has been called.
 */
export function getRunId(): string | null {
  return currentRunId;
}
