export * from "./protocol/index.ts";
export * from "./utils/errors.ts";
export {
  Logger,
  LogLevel,
  LogEventType,
  type LogEntry,
  type ConsoleSink,
} from "./utils/logger.ts";
