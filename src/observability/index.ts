// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export {
  type LogContext,
  asyncLocalStorage,
  getCorrelationId,
  getLogContext,
  addLogContext,
} from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  ledgerOperationsTotal,
  requestAmount,
  settledVolumeTotal,
  valueTransfersTotal,
  persistenceWritesTotal,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';
