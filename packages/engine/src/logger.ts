/**
 * Process-wide diagnostic log.
 *
 * Entry points never throw; they report what went wrong here and return an
 * empty result. Entries go to a bounded buffer, to subscribers, and to
 * stderr when at or above the minimum level.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = "DEBUG" | "INFO" | "WARN" | "ERROR";

export const LogSource = {
  WELD: "weld",
  SCENE: "scene",
  IMPORT: "import",
  RESOURCE: "resource",
  MSG: "msg",
  TEXT: "text",
  MARKER: "marker",
  MCP: "mcp",
} as const;

export type LogSourceName = (typeof LogSource)[keyof typeof LogSource];

export interface LogEntry {
  timestamp: number;
  level: LogLevelName;
  source: LogSourceName;
  message: string;
}

export type LogSubscriber = (entry: LogEntry) => void;

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

const MAX_ENTRIES = 1000;

class Logger {
  private entries: LogEntry[] = [];
  private subscribers = new Set<LogSubscriber>();
  private minLevel = LogLevel.WARN;
  private consoleEnabled = true;

  debug(source: LogSourceName, message: string): void {
    this.log(LogLevel.DEBUG, source, message);
  }

  info(source: LogSourceName, message: string): void {
    this.log(LogLevel.INFO, source, message);
  }

  warn(source: LogSourceName, message: string): void {
    this.log(LogLevel.WARN, source, message);
  }

  error(source: LogSourceName, message: string): void {
    this.log(LogLevel.ERROR, source, message);
  }

  /** Minimum level echoed to the console. Subscribers see every entry. */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  setConsoleEnabled(enabled: boolean): void {
    this.consoleEnabled = enabled;
  }

  /** Register a subscriber. Returns a function that removes it. */
  subscribe(fn: LogSubscriber): () => void {
    this.subscribers.add(fn);
    return () => {
      this.subscribers.delete(fn);
    };
  }

  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  clear(): void {
    this.entries = [];
  }

  private log(level: LogLevel, source: LogSourceName, message: string): void {
    const entry: LogEntry = {
      timestamp: Date.now(),
      level: LEVEL_NAMES[level],
      source,
      message,
    };

    this.entries.push(entry);
    if (this.entries.length > MAX_ENTRIES) {
      this.entries.splice(0, this.entries.length - MAX_ENTRIES);
    }

    for (const fn of this.subscribers) {
      fn(entry);
    }

    // stdout belongs to the MCP transport, so everything goes to stderr
    if (this.consoleEnabled && level >= this.minLevel) {
      console.error(`[${source}] ${message}`);
    }
  }
}

export const logger = new Logger();

/** Parse a level name such as `"warn"` (case-insensitive). */
export function parseLogLevel(name: string): LogLevel | null {
  switch (name.toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    default:
      return null;
  }
}
