export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  context?: string;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Discards everything. Models use it unless a logger is configured. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Writes `[level] (context) message` lines through `console`, followed by the
 * data serialized as JSON when present.
 */
export function consoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = levelPriority[options.level ?? "info"];
  const prefix = options.context ? ` (${options.context})` : "";

  function format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const line = `[${level}]${prefix} ${message}`;

    return data ? `${line} ${JSON.stringify(data)}` : line;
  }

  function shouldLog(level: LogLevel): boolean {
    return levelPriority[level] >= threshold;
  }

  return {
    debug(message, data) {
      if (shouldLog("debug")) {
        console.debug(format("debug", message, data));
      }
    },
    info(message, data) {
      if (shouldLog("info")) {
        console.info(format("info", message, data));
      }
    },
    warn(message, data) {
      if (shouldLog("warn")) {
        console.warn(format("warn", message, data));
      }
    },
    error(message, data) {
      if (shouldLog("error")) {
        console.error(format("error", message, data));
      }
    },
  };
}
