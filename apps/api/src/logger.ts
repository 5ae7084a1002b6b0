import pino from 'pino';

import type { Env } from './env';

export function createLogger(level: Env['LOG_LEVEL']): pino.Logger {
  return pino({
    level,
    transport:
      process.env.NODE_ENV !== 'production'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
            },
          }
        : undefined,
  });
}
