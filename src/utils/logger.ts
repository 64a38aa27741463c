// Structured logging (pino, pretty-printed on a terminal)

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { env } from '../env.js';

export type { Logger };

// Credential-bearing paths never reach a log line
const REDACT_PATHS = [
  'credentials',
  '*.credentials',
  'accessKeyId',
  'secretAccessKey',
  '*.accessKeyId',
  '*.secretAccessKey',
  'headers.authorization',
  '*.headers.authorization',
];

function buildOptions(level: string): LoggerOptions {
  const options: LoggerOptions = {
    level,
    base: undefined,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
  };

  if (process.stdout.isTTY && env.NODE_ENV !== 'test') {
    options.transport = {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    };
  }

  return options;
}

export function createLogger(level: string = env.LOG_LEVEL): Logger {
  return pino(buildOptions(level));
}

export const logger = createLogger();
