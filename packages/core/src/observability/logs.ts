/**
 * Structured console logging for stores
 *
 * Every entry becomes one line:
 * `[timestamp] [LEVEL] [event] <store> message {details}`
 * Debug lines are only written when STRATA_DEBUG is set.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  store?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export type LogFields = Pick<LogEntry, "store" | "message" | "details">;

export type ScopedLogger = Record<LogLevel, (event: string, fields?: LogFields) => void>;

const sinks: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * Render an entry as a single console line
 */
export function formatLogLine(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  if (entry.store) parts.push(`<${entry.store}>`);
  if (entry.message) parts.push(entry.message);
  if (entry.details) parts.push(JSON.stringify(entry.details));
  return parts.join(" ");
}

class Logger implements ScopedLogger {
  #enabled = true;

  log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.STRATA_DEBUG) return;

    sinks[level](formatLogLine({ timestamp: new Date().toISOString(), level, event, ...fields }));
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log("error", event, fields);
  }

  /**
   * Logger that tags every entry with a store name
   */
  forStore(store: string): ScopedLogger {
    const scoped = (level: LogLevel) => (event: string, fields?: LogFields) =>
      this.log(level, event, { store, ...fields });
    return {
      debug: scoped("debug"),
      info: scoped("info"),
      warn: scoped("warn"),
      error: scoped("error"),
    };
  }

  /**
   * Turn every logger, scoped ones included, on or off
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export const logger = new Logger();
