import type { LogContext, Logger } from "../interfaces/logger.js";

/** Default when no logger is injected. */
export const noopLogger: Logger = Object.freeze({
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
});

/** Wrap `logger` so every entry carries `component` unless the caller sets one. */
export function componentLogger(logger: Logger, component: string): Logger {
  const withComponent = (ctx?: LogContext): LogContext => ({ component, ...ctx });
  return {
    debug: (msg, ctx) => logger.debug?.(msg, withComponent(ctx)),
    info: (msg, ctx) => logger.info(msg, withComponent(ctx)),
    warn: (msg, ctx) => logger.warn(msg, withComponent(ctx)),
    error: (msg, ctx) => logger.error(msg, withComponent(ctx)),
  };
}
