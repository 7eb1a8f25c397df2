import pino, { type Logger } from 'pino';
import { config } from '../config/index.js';

export const logger: Logger = pino({
  level: config.LOG_LEVEL,
  transport: config.NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    service: 'trixel-contributor',
    env: config.NODE_ENV,
    instance: config.INSTANCE_ID,
  },
});

export type { Logger };

/**
 * Create a child logger with additional context.
 */
export function createLogger(name: string, bindings?: Record<string, unknown>): Logger {
  return logger.child({ name, ...bindings });
}
