/**
 * Logger Interface
 *
 * Minimal pluggable logger. Any structured logger with these four methods
 * satisfies it without an explicit dependency.
 *
 * Default: no-op. Call setLogger() at startup, or pass `logger` in the
 * server config, to wire one in.
 */
export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: unknown, data?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const noop = () => {};

/** Module-level logger. Always callable; defaults to no-op. */
export const logger: Logger = { debug: noop, info: noop, warn: noop, error: noop };

/** Replace the logger implementation. Call once at startup. */
export function setLogger(impl: Logger): void {
  logger.debug = impl.debug.bind(impl);
  logger.info = impl.info.bind(impl);
  logger.warn = impl.warn.bind(impl);
  logger.error = impl.error.bind(impl);
}
