/**
 * Library configuration.
 * Validates and exposes typed configuration values read from the environment.
 */

import { ConfigError, optionalEnv, optionalEnvBool, maybeEnv, parseBool } from "./env.js";

export { ConfigError } from "./env.js";

// Re-export markup option schemas and loaders
export * from "./markup/index.js";

export const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Minimum log level */
  readonly logLevel: string;
  /** Log file path; file logging is off when unset */
  readonly logFile?: string;
  /** Write log entries to the console */
  readonly logConsole: boolean;
}

/**
 * Read configuration from the environment.
 * Never throws: unrecognised values are kept as read (LOG_LEVEL) or fall
 * back to the default (LOG_CONSOLE) until `validateConfig` checks them.
 */
export function loadConfig(): AppConfig {
  const logConsole = maybeEnv("LOG_CONSOLE");
  return Object.freeze({
    logLevel: optionalEnv("LOG_LEVEL", "warn"),
    logFile: maybeEnv("LOG_FILE"),
    logConsole: (logConsole === undefined ? undefined : parseBool(logConsole)) ?? true,
  });
}

/** Configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values.
 * Call before building anything from the config to fail fast.
 */
export function validateConfig(target: AppConfig = config): void {
  if (!LOG_LEVELS.includes(target.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${target.logLevel}. Must be debug, info, warn, or error.`
    );
  }
  optionalEnvBool("LOG_CONSOLE", target.logConsole);
}
