/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, LEDGER_CONFIG, RATE_LIMIT_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

const intFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const floatFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseFloat(raw);
  return Number.isNaN(parsed) ? fallback : parsed;
};

// =============================================================================
// STORAGE BACKENDS
// =============================================================================

export type LedgerStoreBackend = 'memory' | 'mongo';
export type AdmissionBackend = 'memory' | 'redis';

export const LEDGER_STORE: LedgerStoreBackend =
  process.env.LEDGER_STORE === 'mongo' ? 'mongo' : 'memory';

export const ADMISSION_BACKEND: AdmissionBackend =
  process.env.ADMISSION_BACKEND === 'redis' ? 'redis' : 'memory';

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

/**
 * MongoDB URI by environment
 * Multi-document transactions need a replica set, even a single-node one.
 */
export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/ledger?replicaSet=rs0'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/ledger-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/ledger?replicaSet=rs0';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = intFromEnv('REDIS_PORT', isTest ? 6380 : 6379);

export const REDIS_PASSWORD = process.env.REDIS_PASSWORD || undefined;

export const REDIS_CONFIG = {
  host: REDIS_HOST,
  port: REDIS_PORT,
  password: REDIS_PASSWORD,
  maxRetriesPerRequest: isProduction ? 5 : 3,
  connectTimeout: isProduction ? 10000 : 5000,
  keyPrefix: process.env.REDIS_KEY_PREFIX || 'ledger:',
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Token bucket settings per identity class
 *
 * capacity is the burst size, refillRatePerSecond the sustained rate.
 * Buckets untouched for idleEvictionMs are dropped by the sweep; a fresh
 * bucket starts full, so eviction never takes permits away from a caller.
 */
export const RATE_LIMIT_CONFIG = {
  classes: {
    anonymous: {
      capacity: intFromEnv('RATE_ANON_CAPACITY', 5),
      refillRatePerSecond: floatFromEnv('RATE_ANON_REFILL_PER_SEC', 1),
    },
    authenticated: {
      capacity: intFromEnv('RATE_AUTH_CAPACITY', isTest ? 1000 : 20),
      refillRatePerSecond: floatFromEnv('RATE_AUTH_REFILL_PER_SEC', isTest ? 1000 : 5),
    },
    service: {
      capacity: intFromEnv('RATE_SERVICE_CAPACITY', 200),
      refillRatePerSecond: floatFromEnv('RATE_SERVICE_REFILL_PER_SEC', 50),
    },
  },
  idleEvictionMs: intFromEnv('BUCKET_IDLE_EVICTION_MS', 10 * 60 * 1000),
  sweepIntervalMs: intFromEnv('BUCKET_SWEEP_INTERVAL_MS', 60 * 1000),
};

// =============================================================================
// LEDGER CONFIGURATION
// =============================================================================

export const LEDGER_CONFIG = {
  // Completed idempotency records are kept this long (24 hours)
  idempotencyRetentionMs: intFromEnv('IDEMPOTENCY_RETENTION_MS', 24 * 60 * 60 * 1000),
  // A PENDING reservation older than this may be taken over by a retry
  idempotencyLeaseMs: intFromEnv('IDEMPOTENCY_LEASE_MS', 30 * 1000),
  // How long a concurrent duplicate waits for the owning request
  idempotencyWaitMs: intFromEnv('IDEMPOTENCY_WAIT_MS', 2000),
  idempotencyPollMs: intFromEnv('IDEMPOTENCY_POLL_MS', 50),
  purgeIntervalMs: intFromEnv('IDEMPOTENCY_PURGE_INTERVAL_MS', 5 * 60 * 1000),
  // Upper bound for every storage call, including the conditional write
  writeTimeoutMs: intFromEnv('STORAGE_WRITE_TIMEOUT_MS', 5000),
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: intFromEnv('PORT', 3000),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = ['CORS_ORIGINS'];
  if (LEDGER_STORE === 'mongo') required.push('MONGODB_URI');
  if (ADMISSION_BACKEND === 'redis') required.push('REDIS_HOST');

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (LEDGER_STORE === 'memory') {
    throw new Error('LEDGER_STORE=memory is not durable and cannot be used in production');
  }
};

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  ledgerStore: LEDGER_STORE,
  admissionBackend: ADMISSION_BACKEND,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
});
