// Logger exports
export { logger, createServiceLogger } from './logger';

// Log context exports
export { LogContext, getCorrelationId, addLogContext, runWithContext } from './log-context';

// Correlation middleware
export { correlationMiddleware } from './correlation';

// Metrics exports
export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  admissionDecisionsTotal,
  activeBuckets,
  bucketsEvictedTotal,
  ledgerSubmissionsTotal,
  ledgerSubmitDuration,
  idempotencyReplaysTotal,
  haltedAccounts,
  resetMetrics,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Metrics middleware
export { metricsMiddleware } from './metrics.middleware';
