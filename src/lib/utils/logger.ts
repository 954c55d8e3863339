/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARNING = 2,
  ERROR = 3,
}

/**
 * Types of events that can be logged
 */
export enum LogEventType {
  LINE_RECEIVED = "line_received",
  REPLY_PARSED = "reply_parsed",
  PARSE_FAILED = "parse_failed",
  REPLY_ENCODED = "reply_encoded",
  GENERIC = "generic",
}

/**
 * A single log entry
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  timestamp: number;
  eventType?: LogEventType;
  data?: unknown;
};

export type ConsoleSink = Pick<Console, "debug" | "log" | "warn" | "error">;

/**
 * Logger with severity levels and event tracking.
 *
 * Writes to the console at or above the configured level and forwards every
 * such entry to registered listeners. The codec never reaches for a shared
 * instance: callers hand one to `ReplyCodec` if they want its events.
 */
export class Logger {
  private level: LogLevel = LogLevel.WARNING;
  private listeners: Set<(entry: LogEntry) => void> = new Set();

  /**
   * @param sink Where formatted output goes, the global console by default
   */
  constructor(private readonly sink: ConsoleSink = console) {}

  /**
   * Sets the minimum log level to output. Messages below this level will be ignored.
   * @param level Minimum log level (DEBUG, INFO, WARNING, or ERROR)
   */
  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Registers a callback to be invoked for each log entry that meets the minimum level.
   * @param listener Callback function that receives the log entry
   * @returns Unsubscribe function to remove the listener
   */
  public onLog(listener: (entry: LogEntry) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private log(
    level: LogLevel,
    message: string,
    eventType?: LogEventType,
    data?: unknown,
  ): void {
    if (this.level <= level) {
      const timestamp = Date.now();
      const entry: LogEntry = { level, message, timestamp, eventType, data };

      const output = `[${LogLevel[level]}] ${message}`;

      switch (level) {
        case LogLevel.DEBUG:
          this.sink.debug(output);
          break;
        case LogLevel.INFO:
          this.sink.log(output);
          break;
        case LogLevel.WARNING:
          this.sink.warn(output);
          break;
        case LogLevel.ERROR:
          this.sink.error(output);
          break;
      }

      this.listeners.forEach((listener) => listener(entry));
    }
  }

  public debug(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, eventType, data);
  }

  public info(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.INFO, message, eventType, data);
  }

  public warning(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.WARNING, message, eventType, data);
  }

  /**
   * Logs an error message. Output at every level.
   */
  public error(message: string, eventType?: LogEventType, data?: unknown): void {
    this.log(LogLevel.ERROR, message, eventType, data);
  }
}

/**
 * Process-wide logger used by the CLI.
 */
export const logger = new Logger();
