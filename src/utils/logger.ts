/**
 * Pino logger shared by the pipeline, repository and scripts.
 * Pretty output in development, JSON otherwise; silent under test unless
 * LOG_LEVEL is set explicitly.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { getEnvConfig } from '@/core/env';
import { CODE_VERSION } from '@/version';

const env = getEnvConfig();

function resolveLevel(): string {
  if (env.nodeEnv === 'test' && !process.env.LOG_LEVEL) {
    return 'silent';
  }
  return env.logLevel;
}

export const logger = pino({
  level: resolveLevel(),
  base: { codeVersion: CODE_VERSION },
  transport:
    env.nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname,codeVersion',
            translateTime: 'SYS:HH:MM:ss',
          },
        }
      : undefined,
});

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}
