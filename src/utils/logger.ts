import { appendFileSync } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Also append every entry to this file. */
  file?: string;
}

// stdout carries the stdio transport, so entries go to stderr.
export class Logger {
  private level: number;
  private context: Record<string, unknown>;
  private file: string | undefined;

  constructor(level: LogLevel = "info", context: Record<string, unknown> = {}, options: LoggerOptions = {}) {
    this.level = LOG_LEVELS[level];
    this.context = context;
    this.file = options.file;
  }

  child(context: Record<string, unknown>): Logger {
    const child = new Logger("debug", { ...this.context, ...context }, { file: this.file });
    child.level = this.level;
    return child;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.level;
  }

  debug(message: string, data?: Record<string, unknown>) {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>) {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>) {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>) {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>) {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...data,
    };
    const line = JSON.stringify(entry) + "\n";

    process.stderr.write(line);
    if (this.file) {
      try {
        appendFileSync(this.file, line);
      } catch (err) {
        process.stderr.write(
          JSON.stringify({ level: "error", message: "Failed to write log file", file: this.file, error: String(err) }) +
            "\n",
        );
        this.file = undefined;
      }
    }
  }
}

let globalLogger = new Logger("info");

export function initLogger(level: LogLevel, options: LoggerOptions = {}): Logger {
  globalLogger = new Logger(level, {}, options);
  return globalLogger;
}

export function getLogger(): Logger {
  return globalLogger;
}
