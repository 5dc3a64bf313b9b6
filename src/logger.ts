/**
 * Pino logger factory. JSON lines on stdout; silent under Vitest and in
 * the test environment.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  /** Defaults to NODE_ENV */
  nodeEnv?: string;
}

export function isLoggingEnabled(options: LoggerOptions = {}): boolean {
  const nodeEnv = options.nodeEnv ?? process.env.NODE_ENV;
  return !(process.env.VITEST === 'true' || nodeEnv === 'test');
}

export function makeLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    enabled: isLoggingEnabled(options),
    base: { service: 'tiered-sale' },
    messageKey: 'msg',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
