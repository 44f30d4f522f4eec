/**
 * Pino logger factory
 *
 * One root logger per process; components take a child with their own bindings.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { env } from '../env.js';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: string;
  /** Pretty-print through pino-pretty (development) */
  pretty?: boolean;
  base?: Record<string, unknown>;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: env.LOG_LEVEL,
  pretty: env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test',
  base: { service: 'datadesk-agents' },
};

// Same transport options the Fastify servers are created with
export const PRETTY_TRANSPORT = {
  target: 'pino-pretty',
  options: {
    translateTime: 'HH:MM:ss Z',
    ignore: 'pid,hostname',
  },
};

export function createLogger(config?: LoggerConfig): Logger {
  const merged = { ...DEFAULT_CONFIG, ...config };

  const options: LoggerOptions = {
    level: merged.level,
    base: merged.base,
  };

  if (merged.pretty) {
    options.transport = PRETTY_TRANSPORT;
  }

  return pino(options);
}
