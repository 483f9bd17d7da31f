/**
 * Application configuration.
 * Reads the environment (and .env) once per CLI invocation.
 */

import { optionalEnv, optionalEnvBool, optionalEnvChoice } from "./env.js";
import { LOG_LEVELS, type LogLevel } from "../logging/index.js";

export { ConfigError, optionalEnv, optionalEnvBool, optionalEnvChoice } from "./env.js";

export * from "./tally/index.js";

export interface AppConfig {
  /** Minimum log level */
  readonly logLevel: LogLevel;
  /** Directory for the log file */
  readonly logDir: string;
  /** Append log lines to a file as well as the console */
  readonly logToFile: boolean;
  /** CSV path used when the CLI is given no --output */
  readonly outputPath: string;
}

/**
 * Load and validate application configuration.
 *
 * @throws ConfigError if a variable holds a value outside its allowed set
 */
export function loadConfig(): AppConfig {
  return {
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, "info"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    outputPath: optionalEnv("TALLY_OUTPUT", "voting_results.csv"),
  };
}
