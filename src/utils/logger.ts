// Pino logger factory
// The same options feed Fastify's request logger and the service loggers

import pino, { type Logger, type LoggerOptions } from 'pino';
import { env } from '../env.js';

export function loggerOptions(): LoggerOptions {
  const options: LoggerOptions = {
    level: env.LOG_LEVEL,
    base: { service: 'turn-orchestrator' },
  };

  // Pretty printing spawns a transport worker; keep it out of tests and production
  if (env.NODE_ENV === 'development') {
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

export const logger: Logger = pino(loggerOptions());

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
