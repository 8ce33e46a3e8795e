import { getConfig } from "../config";

import type { LogLevel } from "./schema";

type LogContext = Record<string, unknown>;

export interface LogWriter {
  log: (line: string) => void;
  warn: (line: string) => void;
  error: (line: string) => void;
}

export interface LoggerConfig {
  level: LogLevel;
  /** Fields merged into every entry's context */
  bindings?: LogContext;
  /** Output target (default: console) */
  writer?: LogWriter;
  /** Output format (default: pretty in development, JSON elsewhere) */
  format?: "json" | "pretty";
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const logLevels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const shouldLog = (level: LogLevel, currentLevel: LogLevel): boolean =>
  logLevels[level] >= logLevels[currentLevel];

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: Error,
): LogEntry => ({
  timestamp: new Date().toISOString(),
  level,
  message,
  ...(context && Object.keys(context).length > 0 && { context }),
  ...(error && {
    error: {
      name: error.name,
      message: error.message,
      ...(error.stack && { stack: error.stack }),
    },
  }),
});

const formatLog = (entry: LogEntry, format: "json" | "pretty"): string => {
  if (format === "pretty") {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context)}` : ""
    }${entry.error ? ` (${entry.error.name}: ${entry.error.message})` : ""}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, error?: Error, context?: LogContext) => void;
  /** Returns a logger that adds `bindings` to every entry */
  child: (bindings: LogContext) => Logger;
}

export const createLogger = (
  loggerConfig: LoggerConfig = { level: getConfig().logging.level },
): Logger => {
  const {
    level,
    bindings = {},
    writer = console,
    format = getConfig().server.nodeEnv === "development" ? "pretty" : "json",
  } = loggerConfig;

  const write = (
    entryLevel: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
  ): void => {
    if (!shouldLog(entryLevel, level)) {
      return;
    }
    const line = formatLog(
      createLogEntry(entryLevel, message, { ...bindings, ...context }, error),
      format,
    );
    if (entryLevel === "error") {
      writer.error(line);
    } else if (entryLevel === "warn") {
      writer.warn(line);
    } else {
      writer.log(line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, error, context) => write("error", message, context, error),
    child: (childBindings) =>
      createLogger({ level, writer, format, bindings: { ...bindings, ...childBindings } }),
  };
};

let defaultLogger: Logger | undefined;

const getDefaultLogger = (): Logger => {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
};

/** Shared logger, configured from the environment on first use */
export const logger: Logger = {
  debug: (message, context) => getDefaultLogger().debug(message, context),
  info: (message, context) => getDefaultLogger().info(message, context),
  warn: (message, context) => getDefaultLogger().warn(message, context),
  error: (message, error, context) => getDefaultLogger().error(message, error, context),
  child: (bindings) => getDefaultLogger().child(bindings),
};
