import { pino, stdTimeFunctions } from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export function createLogger(level: string, name = 'history-injector'): Logger {
  return pino({
    name,
    level,
    base: undefined,
    timestamp: stdTimeFunctions.isoTime,
  });
}

/** Logger that drops everything; the default for library components and tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
