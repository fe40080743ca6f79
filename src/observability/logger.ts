import pino from 'pino';

import { config } from '../config';

/**
 * Pino logger configuration
 * - Production: JSON logs at info level
 * - Development: Pretty printed logs at debug level
 * - Test: silent unless LOG_LEVEL says otherwise
 */
export const logger = pino({
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'ledger',
    env: config.nodeEnv,
  },
  ...(config.logging.prettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  }),
});

// Child logger factory for component-specific logging
export const createServiceLogger = (component: string) => {
  return logger.child({ component });
};
