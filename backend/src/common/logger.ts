/**
 * Logger
 *
 * The ingest core only sees the Logger shape, so tests can hand in vi.fn()
 * spies. Production code passes the pino instance Fastify also logs through.
 */

import pino from 'pino';

export interface Logger {
  info: (obj: object, msg?: string) => void;
  warn: (obj: object, msg?: string) => void;
  error: (obj: object, msg?: string) => void;
  debug?: (obj: object, msg?: string) => void;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export function createLogger(level: LogLevel = 'info'): pino.Logger {
  return pino({
    level,
    base: { svc: 'market-data' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
