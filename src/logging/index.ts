/**
 * Logging utilities.
 */

export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
export { getLogger, setLogger } from "./shared.js";
