/**
 * Structured logging for catalog operations
 *
 * One JSON line per event on stderr, so command output on stdout stays
 * machine-readable.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Parse a level name, falling back to `fallback` for anything unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  const level = LEVELS.find((candidate) => candidate === value?.trim().toLowerCase());
  return level ?? fallback;
}

export class Logger {
  #minLevel: LogLevel;
  #enabled = true;
  #sink: (line: string) => void;

  constructor(minLevel: LogLevel = "warn", sink: (line: string) => void = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#sink = sink;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.#enabled && LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Omit<LogEntry, "ts" | "level" | "event">): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#sink(JSON.stringify(entry));
  }

  debug(event: string, data?: Omit<LogEntry, "ts" | "level" | "event">): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Omit<LogEntry, "ts" | "level" | "event">): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Omit<LogEntry, "ts" | "level" | "event">): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Omit<LogEntry, "ts" | "level" | "event">): void {
    this.log("error", event, data);
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance, level from BOOKSHELF_LOG_LEVEL
 */
export const logger = new Logger(parseLogLevel(process.env.BOOKSHELF_LOG_LEVEL));
