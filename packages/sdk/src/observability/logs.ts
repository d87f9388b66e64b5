/**
 * Structured logging for bucket and table lifecycle events
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  table?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Minimum level from the environment: BUCKETDB_DEBUG forces debug, otherwise
 * BUCKETDB_LOG_LEVEL, otherwise "info"
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.BUCKETDB_DEBUG) {
    return "debug";
  }
  const level = env.BUCKETDB_LOG_LEVEL?.toLowerCase();
  return isLogLevel(level) ? level : "info";
}

export class Logger {
  #enabled = true;
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = "info") {
    this.#minLevel = minLevel;
  }

  #shouldLog(level: LogLevel): boolean {
    return this.#enabled && LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  /**
   * Format an entry as a single console line
   */
  format(entry: LogEntry): string {
    const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

    if (entry.table) {
      parts.push(entry.table);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    return parts.join(" ");
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };
    const line = this.format(entry);

    // Route to appropriate console method
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger(levelFromEnv());
