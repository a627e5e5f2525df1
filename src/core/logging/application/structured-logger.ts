import { isLogLevelEnabled, type LogContext, type Logger, type LogLevel } from "../domain/logger.js";

export type EmittedLevel = Exclude<LogLevel, "silent">;

export interface LogRecord {
  timestamp: string;
  level: EmittedLevel;
  message: string;
  context?: LogContext;
}

export type LogSink = (record: LogRecord) => void;

export interface StructuredLoggerOptions {
  level: LogLevel;
  sink: LogSink;
  bindings?: LogContext;
  now?: () => Date;
}

export class StructuredLogger implements Logger {
  public readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly bindings: LogContext;
  private readonly now: () => Date;

  public constructor(options: StructuredLoggerOptions) {
    this.level = options.level;
    this.sink = options.sink;
    this.bindings = { ...options.bindings };
    this.now = options.now ?? (() => new Date());
  }

  public child(context: LogContext): Logger {
    return new StructuredLogger({
      level: this.level,
      sink: this.sink,
      now: this.now,
      bindings: { ...this.bindings, ...context }
    });
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return isLogLevelEnabled(this.level, level);
  }

  public error(message: string, context?: LogContext): void {
    this.record("error", message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.record("warn", message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.record("info", message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.record("debug", message, context);
  }

  private record(level: EmittedLevel, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const merged = { ...this.bindings, ...context };
    const record: LogRecord = {
      timestamp: this.now().toISOString(),
      level,
      message
    };
    if (Object.keys(merged).length > 0) {
      record.context = merged;
    }
    this.sink(record);
  }
}

const silentLogger: Logger = {
  level: "silent",
  child: () => silentLogger,
  isLevelEnabled: () => false,
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined
};

export function createNoopLogger(): Logger {
  return silentLogger;
}
