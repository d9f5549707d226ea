import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { createLedgerContext, restoreLedgerContext, LedgerContext } from './context';
import { eventBus } from './events/eventBus';
import { logger } from './observability';
import {
  MongoRequestRepository,
  RequestPersistence,
  registerRequestEventPublisher,
  unregisterRequestEventPublisher,
  flushRequestEvents,
} from './services/request';

const loadContext = async (): Promise<{ context: LedgerContext; persistence?: RequestPersistence }> => {
  if (!config.ledger.persistence) {
    logger.warn('Ledger persistence disabled; state lives in memory only');
    return { context: createLedgerContext() };
  }

  await connectDatabase();

  const repository = new MongoRequestRepository();
  const context = await restoreLedgerContext(repository);
  const persistence = new RequestPersistence(repository);
  persistence.attach(context.ledger);

  logger.info({ nextRequestId: context.ledger.getNextRequestId() }, 'Ledger restored');
  return { context, persistence };
};

const startServer = async (): Promise<void> => {
  try {
    logger.info(getEnvironmentInfo(), 'Starting payment request ledger');

    const { context, persistence } = await loadContext();

    if (config.ledger.publishEvents) {
      await eventBus.connect();
      registerRequestEventPublisher(context.ledger);
    }

    const app = createApp({ ...context, persistence });

    const server = app.listen(config.port, () => {
      logger.info(
        { port: config.port, env: config.nodeEnv, expiryPolicy: context.ledger.expiryPolicy },
        'Server running'
      );
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');

        const drain = async (): Promise<void> => {
          unregisterRequestEventPublisher();
          await flushRequestEvents();
          persistence?.stop();
          await persistence?.flush();
          await eventBus.disconnect();
          await disconnectDatabase();
        };

        drain()
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
