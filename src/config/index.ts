import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  LEDGER_STORE,
  ADMISSION_BACKEND,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_CONFIG,
  RATE_LIMIT_CONFIG,
  LEDGER_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  validateProductionEnv,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, validateProductionEnv, getEnvironmentInfo };

export * from './environments';

/**
 * Main application configuration object
 *
 * Consolidates all environment-specific settings.
 * For individual values you can also import directly from './environments'.
 */
export const config = {
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  port: API_CONFIG.port,

  backends: {
    ledgerStore: LEDGER_STORE,
    admission: ADMISSION_BACKEND,
  },

  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  redis: REDIS_CONFIG,

  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  rateLimit: RATE_LIMIT_CONFIG,

  ledger: LEDGER_CONFIG,

  logging: LOG_CONFIG,
};

export type AppConfig = typeof config;
