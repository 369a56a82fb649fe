/**
 * Logger contract the library writes to. Nothing logs through `console`
 * directly; callers inject an implementation (or get the no-op default).
 * @module
 */

export type LogContext = Record<string, unknown>;

/** Structured logger with optional debug level. */
export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
