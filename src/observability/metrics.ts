import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'ledger' });

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
// Admission Metrics
// ============================================

export const admissionDecisionsTotal = new Counter({
  name: 'admission_decisions_total',
  help: 'Token bucket decisions by identity class and outcome',
  labelNames: ['identity_class', 'outcome'] as const, // admitted, throttled
  registers: [registry],
});

export const activeBuckets = new Gauge({
  name: 'admission_active_buckets',
  help: 'Buckets currently held in memory',
  registers: [registry],
});

export const bucketsEvictedTotal = new Counter({
  name: 'admission_buckets_evicted_total',
  help: 'Idle buckets removed by the eviction sweep',
  registers: [registry],
});

// ============================================
// Ledger Metrics
// ============================================

export const ledgerSubmissionsTotal = new Counter({
  name: 'ledger_submissions_total',
  help: 'Ledger submissions by operation and outcome',
  labelNames: ['operation', 'outcome'] as const,
  registers: [registry],
});

export const ledgerSubmitDuration = new Histogram({
  name: 'ledger_submit_duration_seconds',
  help: 'Time spent in submit, admission through commit',
  labelNames: ['outcome'] as const,
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 5],
  registers: [registry],
});

export const idempotencyReplaysTotal = new Counter({
  name: 'idempotency_replays_total',
  help: 'Requests answered from a stored idempotency record',
  registers: [registry],
});

export const haltedAccounts = new Gauge({
  name: 'ledger_halted_accounts',
  help: 'Accounts halted after an invariant breach',
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
