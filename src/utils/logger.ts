/**
 * Logging with Pino - pretty output in development
 */

import pino from 'pino';
import { getEnvConfig } from '@/core/env';

const env = getEnvConfig();

export const logger = pino({
  level: env.logLevel,
  base: { service: 'dcf-valuation' },
  transport:
    env.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
