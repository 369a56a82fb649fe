import { GlowlineError } from "../errors.js";
import type { LogContext, Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_FIELDS = new Set(["time", "level", "msg"]);

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  /** Fixed component name; when unset, a `component` key in the context is used. */
  component?: string;
}

/** Writes one JSON object per line (stderr by default). */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly level: LogLevel;
  private readonly component: string | undefined;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
  }

  debug(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: LogContext): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: LogContext): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {};

    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (RESERVED_FIELDS.has(key)) continue;
        if (value instanceof Error) {
          entry[key] = value.message;
          if (value instanceof GlowlineError) entry[`${key}Code`] = value.code;
          entry[`${key}Stack`] = value.stack;
        } else {
          entry[key] = value;
        }
      }
    }

    if (this.component) entry.component = this.component;

    const line = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
      ...entry,
    };

    try {
      this.writer(JSON.stringify(line));
    } catch {
      // Unserializable context: fall back to the bare entry
      this.writer(
        JSON.stringify({ time: line.time, level: line.level, msg, serializationError: true }),
      );
    }
  }
}
