export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  readonly level: LogLevel;

  child(context: LogContext): Logger;
  isLevelEnabled(level: LogLevel): boolean;
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(raw: string | null | undefined, fallback: LogLevel = "warn"): LogLevel {
  const normalized = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : fallback;
}

/** A record at `target` is emitted when the logger is configured at `current` or more verbose. */
export function isLogLevelEnabled(current: LogLevel, target: LogLevel): boolean {
  if (target === "silent") {
    return false;
  }
  return LOG_LEVELS.indexOf(target) <= LOG_LEVELS.indexOf(current);
}
