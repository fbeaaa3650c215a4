/**
 * Structured logger for the playback bridge.
 *
 * Leveled logging (debug/info/warn/error) with ISO timestamps, component
 * tags and optional key=value context. Writes to the console unless a global
 * handler is installed (tests install one to capture entries).
 *
 * Usage:
 *   const log = new Logger("Reporter");
 *   log.info("Playback started", { itemId: "abc" });
 *   // → 2026-02-21T10:30:00.000Z [INFO] [Reporter] Playback started itemId=abc
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Readonly<Record<string, string | number | boolean | null | undefined>>;

export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly component: string;
  readonly message: string;
  readonly context?: LogContext;
}

export type LogHandler = (entry: LogEntry) => void;

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

let globalHandler: LogHandler | null = null;
let globalMinLevel: LogLevel = "info";

/** Set a global handler to intercept all log entries. Pass null to reset to console output. */
export function setLogHandler(handler: LogHandler | null): void {
  globalHandler = handler;
}

/** Set the minimum log level. Messages below this level are silently dropped. */
export function setMinLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function getMinLogLevel(): LogLevel {
  return globalMinLevel;
}

/** Parse a LOG_LEVEL value. Returns null for anything that is not a known level. */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? null;
}

/** Message of a caught value, whatever was thrown. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatContext(context: LogContext): string {
  return Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`)
    .join(" ");
}

/**
 * Format a LogEntry into a single-line string for console output.
 *
 * Format: `2026-02-21T10:30:00.000Z [LEVEL] [Component] message key=value`
 */
export function formatLogEntry(entry: LogEntry): string {
  const line = `${entry.timestamp} [${entry.level.toUpperCase()}] [${entry.component}] ${entry.message}`;
  const context = entry.context ? formatContext(entry.context) : "";
  return context ? `${line} ${context}` : line;
}

export class Logger {
  constructor(private readonly component: string) {}

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  /** Create a child logger with a sub-component prefix (e.g., "Bridge:Socket"). */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}:${subComponent}`);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[globalMinLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...(context ? { context } : {}),
    };

    if (globalHandler) {
      globalHandler(entry);
      return;
    }

    const formatted = formatLogEntry(entry);
    switch (level) {
      case "error":
        console.error(formatted);
        break;
      case "warn":
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
        break;
    }
  }
}
