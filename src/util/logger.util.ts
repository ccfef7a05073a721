/**
 * Console Logger
 *
 * Console-backed Logger with a minimum level and a `[tmplroute]` prefix.
 */

import type { Logger, LogLevel } from '../type/logger.type.ts';

const PREFIX = '[tmplroute]';
const ORDER: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Minimal console surface, so tests can pass a recorder. */
export interface ConsoleLike {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createConsoleLogger(
  level: LogLevel = 'info',
  out: ConsoleLike = console,
): Logger {
  const min = ORDER.indexOf(level);
  const enabled = (lvl: LogLevel) => ORDER.indexOf(lvl) >= min;

  function write(lvl: LogLevel, msg: string, data?: Record<string, unknown>): void {
    if (!enabled(lvl)) return;
    if (data !== undefined) {
      out[lvl](`${PREFIX} ${msg}`, data);
    } else {
      out[lvl](`${PREFIX} ${msg}`);
    }
  }

  return {
    debug: (msg, data) => write('debug', msg, data),
    info: (msg, data) => write('info', msg, data),
    warn: (msg, data) => write('warn', msg, data),
    error(msg, error, data) {
      if (!enabled('error')) return;
      const detail = { ...(data ?? {}), ...(error !== undefined ? { error } : {}) };
      if (Object.keys(detail).length > 0) {
        out.error(`${PREFIX} ${msg}`, detail);
      } else {
        out.error(`${PREFIX} ${msg}`);
      }
    },
  };
}
