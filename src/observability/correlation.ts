import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { asyncLocalStorage, LogContext } from './log-context';
import { logger } from './logger';

const CORRELATION_HEADER = 'x-correlation-id';
const MAX_CORRELATION_ID_LENGTH = 128;

/**
 * Accept a caller-supplied id only when it is a short printable token
 */
const incomingId = (req: Request): string | undefined => {
  const value = req.get(CORRELATION_HEADER) ?? req.get('x-request-id');
  if (!value || value.length > MAX_CORRELATION_ID_LENGTH || !/^[\w.:-]+$/.test(value)) {
    return undefined;
  }
  return value;
};

/**
 * Runs the rest of the request inside a log context keyed by a correlation
 * id, echoed back in the response header. Handlers add the caller identity
 * and the request id they touched.
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const context: LogContext = { correlationId: incomingId(req) ?? uuid() };
  res.setHeader(CORRELATION_HEADER, context.correlationId);

  asyncLocalStorage.run(context, () => {
    const startedAt = Date.now();
    logger.debug({ method: req.method, path: req.path }, 'Request started');

    res.on('finish', () => {
      logger.info(
        {
          correlationId: context.correlationId,
          identity: context.identity,
          requestId: context.requestId,
          method: req.method,
          path: req.originalUrl,
          statusCode: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        'Request completed'
      );
    });

    next();
  });
};
