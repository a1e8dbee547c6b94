import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'pocket-ledger' });

// Collect default Node.js metrics (CPU, memory, event loop, etc.)
if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

/**
 * Total HTTP requests counter
 */
export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

/**
 * HTTP request duration histogram
 */
export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2],
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

/**
 * Ledger operations by type and outcome
 */
export const ledgerOperationsTotal = new Counter({
  name: 'ledger_operations_total',
  help: 'Ledger operations by type and outcome',
  labelNames: ['operation', 'outcome'] as const, // debit/transfer, success/insufficient_funds
  registers: [registry],
});

/**
 * Balance after the last completed ledger operation
 */
export const ledgerBalance = new Gauge({
  name: 'ledger_balance',
  help: 'Current ledger balance',
  registers: [registry],
});

/**
 * Bank counter after the last completed ledger operation
 */
export const ledgerBank = new Gauge({
  name: 'ledger_bank',
  help: 'Current ledger bank',
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

/**
 * Get all metrics as Prometheus text format
 */
export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

/**
 * Get content type for metrics response
 */
export const getMetricsContentType = (): string => {
  return registry.contentType;
};
