import cors from 'cors';
import express, { type Express } from 'express';
import type { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { errorHandler, notFoundHandler } from './infrastructure/http/middleware/errorHandler.js';
import { idempotencyMiddleware } from './infrastructure/http/middleware/idempotency.js';
import { requestLogger } from './infrastructure/http/middleware/requestLogger.js';
import { accountRoutes } from './infrastructure/http/routes/accountRoutes.js';
import { operationTypeRoutes, transactionRoutes } from './infrastructure/http/routes/transactionRoutes.js';

export const APP_NAME = 'Banking API';
export const APP_VERSION = '0.1.0';

export const createApp = (container: AppContainer): Express => {
  const app = express();

  app.use(cors({ origin: '*', credentials: false }));
  app.use(requestLogger(container.logger));
  app.use(express.json({ limit: '100kb' }));
  app.use(idempotencyMiddleware(container.idempotency));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      name: APP_NAME,
      version: APP_VERSION,
      storage: container.config.storage.driver,
    });
  });

  app.use('/accounts', accountRoutes(container.accountService, container.transactionService));
  app.use('/transactions', transactionRoutes(container.transactionService));
  app.use('/operation-types', operationTypeRoutes(container.transactionService));

  app.use(notFoundHandler);
  app.use(errorHandler(container.logger));

  return app;
};
