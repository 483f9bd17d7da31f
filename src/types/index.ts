/**
 * Shared type foundations for the vote tally.
 */

export * from "./message.js";
export * from "./report.js";
