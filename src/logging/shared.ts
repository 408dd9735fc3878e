/**
 * Shared library logger, built from the environment configuration on
 * first use. An unknown LOG_LEVEL falls back to "warn".
 */

import { config } from "../config/index.js";
import { createLogger, isLogLevel, type Logger } from "./logger.js";

let sharedLogger: Logger | null = null;

export function getLogger(): Logger {
  if (sharedLogger === null) {
    sharedLogger = createLogger({
      level: isLogLevel(config.logLevel) ? config.logLevel : "warn",
      logFile: config.logFile,
      console: config.logConsole,
    });
  }
  return sharedLogger;
}

/**
 * Replace the shared logger (e.g. to route library logs into an
 * application's own logger). Passing null restores the default.
 */
export function setLogger(logger: Logger | null): void {
  sharedLogger = logger;
}
