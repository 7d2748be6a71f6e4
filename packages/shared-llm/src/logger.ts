/**
 * FILE PURPOSE: Structured logger shared by the guardrail modules
 *
 * HOW: pino JSON lines on stdout with ISO timestamps. Level from LOG_LEVEL.
 *      Components take the logger as a constructor option so tests can pass
 *      a silent one.
 */

import { pino, type Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export interface LoggerOptions {
  level?: string;
  service?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    base: {
      service: options.service ?? 'response-guardrail',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
