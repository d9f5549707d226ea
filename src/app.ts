import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import type { AppContext } from './context';
import { errorHandler, notFoundHandler } from './middlewares';
import { createHealthRoutes } from './routes/health';
import { createRequestRoutes } from './services/request';
import { createWalletRoutes } from './services/wallet';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export const createApp = (context: AppContext): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors(config.isProduction ? { origin: config.api.corsOrigins } : undefined));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', createHealthRoutes(context));
  app.use('/requests', createRequestRoutes(context.ledger));
  app.use('/wallets', createWalletRoutes(context.vault));

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
      name: 'Payment Request Ledger API',
      version: '1.0.0',
      description: 'Escrow ledger for payment requests between two parties',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
