import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { createLedgerCore, LedgerCore } from './core';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { createHealthRoutes } from './routes/health';
import { createAccountRoutes } from './services/transaction';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export const createApp = (core: LedgerCore = createLedgerCore()): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors(config.isProduction ? { origin: config.api.corsOrigins } : undefined));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', createHealthRoutes(core));
  app.use('/accounts', createAccountRoutes(core.transactions));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'ratelimited-ledger',
      version: '1.0.0',
      description: 'Rate-gated, optimistically concurrent balance ledger',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
