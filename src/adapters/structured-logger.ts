import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, LogLevelName> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

export type LogLevelName = "debug" | "info" | "warn" | "error";

const RESERVED_KEYS = new Set(["time", "level", "msg", "component"]);

export function parseLogLevel(name: LogLevelName): LogLevel {
  switch (name) {
    case "debug":
      return LogLevel.DEBUG;
    case "info":
      return LogLevel.INFO;
    case "warn":
      return LogLevel.WARN;
    case "error":
      return LogLevel.ERROR;
  }
}

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
}

/**
 * JSON-lines logger. Writes to stderr by default: stdout carries the hook
 * response and must contain nothing else.
 */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.WARN;
    this.component = options.component;
  }

  /** Logger sharing this writer and level, tagged with another component. */
  child(component: string): StructuredLogger {
    return new StructuredLogger({ writer: this.writer, level: this.level, component });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {};

    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (RESERVED_KEYS.has(key)) continue;
        if (value instanceof Error) {
          entry[key] = value.message;
          entry[`${key}Stack`] = value.stack;
        } else {
          entry[key] = value;
        }
      }
    }

    const time = new Date().toISOString();
    const line: Record<string, unknown> = { time, level: LEVEL_NAMES[level], msg };
    if (this.component) line.component = this.component;

    try {
      this.writer(JSON.stringify({ ...line, ...entry }));
    } catch {
      // Circular reference or other serialization failure: minimal line
      this.writer(JSON.stringify({ ...line, serializationError: true }));
    }
  }
}
