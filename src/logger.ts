/**
 * Small structured logger.
 * JSON lines in production, human-readable lines otherwise. Everything goes to
 * stderr so that stdout only ever carries reports.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

type LogThreshold = LogLevel | "silent";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  scope?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function currentThreshold(): LogThreshold {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  switch (configured) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "silent":
      return configured;
    default:
      return process.env.NODE_ENV === "production" ? "info" : "debug";
  }
}

function formatLog(
  level: LogLevel,
  message: string,
  scope: string | undefined,
  meta?: Record<string, unknown>
): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(scope ? { scope } : {}),
    ...meta,
  };

  if (process.env.NODE_ENV === "production") {
    return JSON.stringify(entry);
  }
  const scopeStr = scope ? ` [${scope}]` : "";
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
  return `[${entry.timestamp}] ${level.toUpperCase()}${scopeStr} ${message}${metaStr}`;
}

function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentThreshold()]) {
      return;
    }
    process.stderr.write(formatLog(level, message, scope, meta) + "\n");
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
}

export const logger: Logger = createLogger();
