import { Request, Response, NextFunction } from 'express';
import { httpRequestsTotal, httpRequestDuration } from './metrics';

const SKIPPED_PATHS = new Set(['/metrics', '/health/live']);

/**
 * Collapse request ids and identities in a path so label cardinality stays
 * bounded when no route matched
 */
export const normalizePath = (path: string): string =>
  path
    .replace(/\/(requester|payer)\/[^/]+/g, '/$1/:identity')
    .replace(/\/\d+(?=\/|$)/g, '/:id');

const routeLabel = (req: Request): string => {
  const pattern: unknown = req.route?.path;
  return typeof pattern === 'string' ? `${req.baseUrl}${pattern}` : normalizePath(req.path);
};

/**
 * HTTP metrics middleware
 * Records request count and duration for Prometheus
 */
export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  if (SKIPPED_PATHS.has(req.path)) {
    next();
    return;
  }

  const stopTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const labels = {
      method: req.method,
      path: routeLabel(req),
      status: String(res.statusCode),
    };

    httpRequestsTotal.inc(labels);
    stopTimer(labels);
  });

  next();
};
