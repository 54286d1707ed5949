import pino from 'pino';
import { env } from '../config/env';

// stdout carries the hook response; logs go to stderr.
export const logger = pino(
  {
    level: env.logLevel,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  },
  pino.destination({ dest: 2, sync: true }),
);

/** Create a child logger scoped to one cache component */
export function componentLogger(component: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ component, ...extra });
}
