import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { Logger } from 'pino';
import { config } from './config';
import { errorHandler, notFoundHandler, asyncHandler } from './middlewares';
import { createHealthRoutes } from './routes/health';
import { Ledger } from './services/ledger';
import { createTransactionRoutes } from './services/transaction';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
} from './observability';

export interface AppDependencies {
  ledger?: Ledger;
  // Request start/end events; defaults to the `http` service logger
  requestLogger?: Logger;
}

export const createApp = (dependencies: AppDependencies = {}): Application => {
  const ledger =
    dependencies.ledger ??
    new Ledger({
      initialBalance: config.ledger.initialBalance,
      initialBank: config.ledger.initialBank,
    });

  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ exposedHeaders: ['X-Request-ID'] }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', createHealthRoutes(ledger));
  app.use('/', createTransactionRoutes(ledger, { logger: dependencies.requestLogger }));

  // Metrics endpoint (Prometheus format)
  app.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    })
  );

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'pocket-ledger',
      version: '1.0.0',
      description: 'Single-ledger pay and save service',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
