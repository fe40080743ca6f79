import { Router, Request, Response } from 'express';
import { config } from '../config';
import { getDatabaseStatus } from '../config/database';
import { isRedisConnected } from '../config/redis';
import { LedgerCore } from '../core';

interface DependencyStatus {
  backend: string;
  connected: boolean;
}

const collectStatus = (): { healthy: boolean; services: Record<string, DependencyStatus> } => {
  const ledgerConnected =
    config.backends.ledgerStore === 'mongo' ? getDatabaseStatus().connected : true;
  const admissionConnected =
    config.backends.admission === 'redis' ? isRedisConnected() === true : true;

  return {
    healthy: ledgerConnected && admissionConnected,
    services: {
      ledgerStore: { backend: config.backends.ledgerStore, connected: ledgerConnected },
      admission: { backend: config.backends.admission, connected: admissionConnected },
    },
  };
};

export const createHealthRoutes = (core: LedgerCore): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const { healthy, services } = collectStatus();
    const haltedAccounts = [...core.transactions.getHaltedAccounts().keys()];

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services,
      haltedAccounts,
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const { healthy } = collectStatus();

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
