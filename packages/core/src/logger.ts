import pino, { type Logger } from 'pino';
import type { LogLevel } from '@qmem/shared';

export type { Logger };

/**
 * Structured logger writing JSON lines to stderr, so command output on
 * stdout stays machine-readable.
 */
export function createLogger(level: LogLevel = 'info', name = 'qmem'): Logger {
  return pino({ name, level }, pino.destination(2));
}

/** Logger that drops everything; the default for library use and tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
