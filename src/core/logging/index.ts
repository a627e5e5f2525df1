export type { LogContext, Logger, LogLevel } from "./domain/logger.js";
export { LOG_LEVELS, isLogLevel, isLogLevelEnabled, parseLogLevel } from "./domain/logger.js";
export {
  StructuredLogger,
  createNoopLogger,
  type EmittedLevel,
  type LogRecord,
  type LogSink,
  type StructuredLoggerOptions
} from "./application/structured-logger.js";
