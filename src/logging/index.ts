/**
 * Logging and observability utilities.
 */

export { generateRunId, generateSessionId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogSink,
  type LoggerOptions,
} from "./logger.js";
