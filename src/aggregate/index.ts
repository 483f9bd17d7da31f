/**
 * Aggregation of parsed messages into result rows.
 */

export {
  aggregate,
  type AggregateOptions,
  type AggregateResult,
} from "./aggregator.js";
