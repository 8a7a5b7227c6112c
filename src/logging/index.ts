/**
 * Logging and observability utilities.
 */

export { generateSessionId } from "./session-id.js";
export {
  createLogger,
  formatLogEntry,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
