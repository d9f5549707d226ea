import { Router, Request, Response } from 'express';
import { config } from '../config';
import { getDatabaseStatus } from '../config/database';
import { eventBus } from '../events/eventBus';
import type { AppContext } from '../context';

/**
 * Database and event bus only count toward health when the ledger is
 * configured to use them. Requests whose writes keep failing make the
 * service unhealthy until they are stored.
 */
const dependencyStatus = (persistence: AppContext['persistence']) => {
  const dbStatus = getDatabaseStatus();
  const eventBusStatus = eventBus.getStatus();
  const persistenceStatus = {
    attached: persistence !== undefined,
    backlog: persistence?.backlog ?? 0,
    failedWrites: persistence?.failedWrites ?? 0,
  };

  const databaseOk = !config.ledger.persistence || dbStatus.connected;
  const eventBusOk = !config.ledger.publishEvents || eventBusStatus.connected;
  const writesOk = persistenceStatus.failedWrites === 0;

  return { dbStatus, eventBusStatus, persistenceStatus, ok: databaseOk && eventBusOk && writesOk };
};

export const createHealthRoutes = ({ ledger, persistence }: AppContext): Router => {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const { dbStatus, eventBusStatus, persistenceStatus, ok } = dependencyStatus(persistence);

    res.status(ok ? 200 : 503).json({
      status: ok ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      services: {
        database: {
          required: config.ledger.persistence,
          connected: dbStatus.connected,
          readyState: dbStatus.readyState,
          state: dbStatus.state,
        },
        eventBus: {
          required: config.ledger.publishEvents,
          connected: eventBusStatus.connected,
        },
        persistence: persistenceStatus,
        ledger: {
          nextRequestId: ledger.getNextRequestId(),
          expiryPolicy: ledger.expiryPolicy,
        },
      },
    });
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/ready', (_req: Request, res: Response) => {
    const { ok } = dependencyStatus(persistence);

    res.status(ok ? 200 : 503).json({
      status: ok ? 'ready' : 'not ready',
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
