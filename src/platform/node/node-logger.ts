import {
  StructuredLogger,
  createNoopLogger,
  parseLogLevel,
  type LogContext,
  type LogLevel,
  type LogRecord,
  type Logger
} from "../../core/logging/index.js";

export const LOG_LEVEL_ENV = "SAVEKEEP_LOG_LEVEL";
export const LOG_FORMAT_ENV = "SAVEKEEP_LOG_FORMAT";

export type NodeLogFormat = "pretty" | "json";

export interface NodeLoggerOptions {
  level?: LogLevel;
  format?: NodeLogFormat;
  stream?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
}

export function createNodeLogger(options: NodeLoggerOptions = {}): Logger {
  const env = options.env ?? process.env;
  const level = options.level ?? parseLogLevel(env[LOG_LEVEL_ENV], "warn");
  if (level === "silent") {
    return createNoopLogger();
  }

  const format = options.format ?? parseLogFormat(env[LOG_FORMAT_ENV]);
  const stream = options.stream ?? process.stderr;

  return new StructuredLogger({
    level,
    sink: (record) => {
      stream.write(format === "json" ? `${JSON.stringify(record)}\n` : renderPretty(record));
    }
  });
}

function parseLogFormat(raw: string | undefined): NodeLogFormat {
  return raw?.trim().toLowerCase() === "json" ? "json" : "pretty";
}

/** `[timestamp] LEVEL scope message {"rest":"of context"}` */
export function renderPretty(record: LogRecord): string {
  const context: LogContext = record.context ?? {};
  const { scope, ...rest } = context;
  const label = record.level.toUpperCase().padEnd(5, " ");
  const scopeLabel = typeof scope === "string" && scope.length > 0 ? ` ${scope}` : "";
  return `[${record.timestamp}] ${label}${scopeLabel} ${record.message}${renderContext(rest)}\n`;
}

function renderContext(context: LogContext): string {
  return Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
}
