export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogSink = (
  level: Exclude<LogLevel, "silent">,
  scope: string,
  message: string,
  details: unknown[]
) => void;

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const severity: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const consoleSink: LogSink = (level, scope, message, details) => {
  const line = `[${scope}] ${message}`;
  switch (level) {
    case "debug":
      console.debug(line, ...details);
      break;
    case "info":
      console.info(line, ...details);
      break;
    case "warn":
      console.warn(line, ...details);
      break;
    case "error":
      console.error(line, ...details);
      break;
  }
};

const DEFAULT_LEVEL: LogLevel = "warn";

let currentLevel: LogLevel = DEFAULT_LEVEL;
let currentSink: LogSink = consoleSink;

export const setLogLevel = (level: LogLevel): void => {
  currentLevel = level;
};

export const getLogLevel = (): LogLevel => currentLevel;

/**
 * Route every logger's output somewhere other than the console.
 */
export const setLogSink = (sink: LogSink): void => {
  currentSink = sink;
};

export const resetLogging = (): void => {
  currentLevel = DEFAULT_LEVEL;
  currentSink = consoleSink;
};

export interface LoggerOptions {
  /** Pin this logger's level instead of following setLogLevel */
  level?: LogLevel;
}

// Level and sink are read at call time, so loggers created at module load
// follow later changes.
export const createLogger = (scope: string, options: LoggerOptions = {}): Logger => {
  const emit =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]) => {
      const threshold = options.level ?? currentLevel;
      if (severity[level] < severity[threshold]) return;
      currentSink(level, scope, message, details);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
};
