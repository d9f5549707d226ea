import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'request-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Ledger operations by outcome (success or the ErrorCode name)
 */
export const ledgerOperationsTotal = new Counter({
  name: 'ledger_operations_total',
  help: 'Ledger operations by operation and outcome',
  labelNames: ['operation', 'outcome'] as const, // create, pay, cancel
  registers: [registry],
});

/**
 * Requested amounts at creation time
 */
export const requestAmount = new Histogram({
  name: 'payment_request_amount',
  help: 'Amounts of created payment requests (minor units)',
  buckets: [100, 500, 1000, 5000, 10000, 50000, 100000, 1000000],
  registers: [registry],
});

/**
 * Value settled to requesters
 */
export const settledVolumeTotal = new Counter({
  name: 'payment_request_settled_volume_total',
  help: 'Total amount settled to requesters (minor units)',
  registers: [registry],
});

// ============================================
// Vault Metrics
// ============================================

export const valueTransfersTotal = new Counter({
  name: 'value_transfers_total',
  help: 'Value transfers out of custody by outcome',
  labelNames: ['outcome'] as const, // success, rejected, short
  registers: [registry],
});

// ============================================
// Persistence Metrics
// ============================================

export const persistenceWritesTotal = new Counter({
  name: 'ledger_persistence_writes_total',
  help: 'Write-behind persistence writes by outcome',
  labelNames: ['outcome'] as const, // success, failure
  registers: [registry],
});

// ============================================
// Utility Functions
// ============================================

/**
 * Reset all metrics (useful for testing)
 */
export const resetMetrics = (): void => {
  registry.resetMetrics();
};

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
