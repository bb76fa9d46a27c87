// Logger configuration shared by Fastify and the orchestrator services
// Services receive `server.log` (or a child of it); tests pass a silent pino instance
import type { FastifyBaseLogger } from 'fastify';
import type { LoggerOptions } from 'pino';
import type { Env } from './env.js';

export type Logger = FastifyBaseLogger;

export function loggerOptions(config: Pick<Env, 'LOG_LEVEL' | 'NODE_ENV'>): LoggerOptions {
  if (config.NODE_ENV === 'production') {
    return { level: config.LOG_LEVEL };
  }

  return {
    level: config.LOG_LEVEL,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}
