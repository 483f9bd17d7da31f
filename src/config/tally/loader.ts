/**
 * Tally options loader and validator.
 *
 * Responsible for:
 * - Validating options against the schema with fail-fast behavior
 * - Producing structured, per-field error messages
 * - Freezing the result so a run cannot change its own policies
 */

import type { ZodIssue } from "zod";
import { TallyOptionsSchema, type TallyOptions } from "./schema.js";
import { DEFAULT_TALLY_OPTIONS } from "./defaults.js";

/**
 * Structured validation error for tally options.
 */
export class TallyOptionsError extends Error {
  public readonly issues: OptionsValidationIssue[];

  constructor(message: string, issues: OptionsValidationIssue[]) {
    super(message);
    this.name = "TallyOptionsError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Tally options validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface OptionsValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): OptionsValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path,
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate and load tally options.
 *
 * @param input - Raw options object to validate
 * @returns Validated and frozen options
 * @throws TallyOptionsError if validation fails
 */
export function loadTallyOptions(input: unknown): Readonly<TallyOptions> {
  const result = TallyOptionsSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new TallyOptionsError(
      `Invalid tally options: ${issues.length} validation error(s)`,
      issues
    );
  }

  // Every field is a primitive, so a shallow freeze is a full freeze
  return Object.freeze(result.data);
}

/**
 * Merge overrides onto the defaults, then validate.
 * Keys whose value is undefined keep the default.
 *
 * @throws TallyOptionsError if the merged options are invalid
 */
export function resolveTallyOptions(
  overrides: Partial<TallyOptions> = {}
): Readonly<TallyOptions> {
  const merged: Record<string, unknown> = { ...DEFAULT_TALLY_OPTIONS };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return loadTallyOptions(merged);
}
