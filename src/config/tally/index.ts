/**
 * Tally options module.
 *
 * Usage:
 *   import { resolveTallyOptions } from "./config/tally/index.js";
 *
 *   const options = resolveTallyOptions({ unresolvedTopicPolicy: "fail" });
 */

export { ParseMode, UnresolvedTopicPolicy } from "./enums.js";

export { TallyOptionsSchema, type TallyOptions } from "./schema.js";

export {
  loadTallyOptions,
  resolveTallyOptions,
  TallyOptionsError,
  type OptionsValidationIssue,
} from "./loader.js";

export { DEFAULT_TALLY_OPTIONS } from "./defaults.js";
