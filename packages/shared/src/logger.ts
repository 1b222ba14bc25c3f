export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  service?: string;
  senderId?: string;
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

/**
 * Destination for serialized log lines. Defaults to stdout, with errors on
 * stderr.
 */
export type LogSink = (level: LogLevel, line: string) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function getConfiguredLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

const processSink: LogSink = (level, line) => {
  if (level === "error") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  /** Fixed minimum level. When omitted, `LOG_LEVEL` is read on every call. */
  level?: LogLevel;
  sink?: LogSink;
}

export function createLogger(
  defaultContext?: LogContext,
  options: LoggerOptions = {},
): Logger {
  const sink = options.sink ?? processSink;

  function log(level: LogLevel, message: string, context?: LogContext): void {
    const minimum = options.level ?? getConfiguredLevel();
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minimum]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...defaultContext,
      ...context,
    };
    sink(level, JSON.stringify(entry));
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child(context: LogContext): Logger {
      return createLogger({ ...defaultContext, ...context }, options);
    },
  };
}

export const logger = createLogger({ service: "mindease" });
