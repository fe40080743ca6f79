import { createApp } from './app';
import { config, getEnvironmentInfo, validateProductionEnv } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { createLedgerCore } from './core';
import { logger } from './observability';

const startServer = async (): Promise<void> => {
  try {
    validateProductionEnv();

    if (config.backends.ledgerStore === 'mongo') {
      await connectDatabase();
    }
    if (config.backends.admission === 'redis') {
      await connectRedis();
    }

    const core = createLedgerCore();
    core.start();

    const app = createApp(core);

    // Start HTTP server
    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, ...getEnvironmentInfo() }, 'Server running');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');
        core.stop();

        Promise.all([disconnectDatabase(), disconnectRedis()])
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
