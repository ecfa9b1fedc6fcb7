export {
  createLogger,
  getLogLevel,
  resetLogging,
  setLogLevel,
  setLogSink,
} from "./logger.js";
export type { LogLevel, LogSink, Logger, LoggerOptions } from "./logger.js";
