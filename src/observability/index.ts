// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export { LogContext, getLogContext, runWithContext } from './log-context';

// Correlation middleware
export {
  CORRELATION_HEADER,
  CORRELATION_ID,
  FALLBACK_CORRELATION_ID,
  RandomSource,
  correlationMiddleware,
  createCorrelationMiddleware,
  generateCorrelationId,
  getCorrelationId,
  resolveCorrelationId,
} from './correlation';

// Request instrumentation
export { ResponseStatusRecorder, DEFAULT_STATUS } from './status-recorder';
export { instrument, InstrumentedHandler, InstrumentationOptions } from './instrumentation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  ledgerOperationsTotal,
  ledgerBalance,
  ledgerBank,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';
