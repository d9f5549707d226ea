import pino from 'pino';

import { config } from '../config';
import { getLogContext } from './log-context';

/**
 * JSON logs in production, pino-pretty in development, silent under test
 * unless LOG_LEVEL says otherwise. Every line carries the correlation id and
 * caller identity of the HTTP request it was written for.
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'request-ledger',
    env: config.nodeEnv,
  },
  mixin: () => {
    const context = getLogContext();
    return context ? { correlationId: context.correlationId, identity: context.identity } : {};
  },
  redact: ['authorization', 'headers.authorization', '*.token'],
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

export type ServiceLogger = pino.Logger;

/**
 * Child logger for one component of the ledger
 */
export const createServiceLogger = (component: string): ServiceLogger =>
  logger.child({ component });
