/**
 * Logger utility using pino
 * Logs go to stderr; stdout carries the report
 */

import pino from 'pino';
import type { Logger } from 'pino';

const STDERR = 2;

export function createLogger(config: { level: string; pretty: boolean }): Logger {
  if (config.pretty) {
    return pino({
      level: config.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR,
        },
      },
    });
  }

  return pino({ level: config.level }, pino.destination(STDERR));
}

/** Logger that discards everything, for library callers that pass none. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export type { Logger };
