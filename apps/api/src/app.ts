import type { QueryServices } from '@tallyview/query';
import express, { type Express } from 'express';

import { errorHandler } from './common/middleware/error-handler.ts';
import { requestLogger } from './common/middleware/request-logger.ts';
import { RouteNotFoundError } from './common/request-errors.ts';
import { createCustomersRouter } from './routes/customers.ts';
import { createFraudRouter } from './routes/fraud.ts';
import { createStatsRouter } from './routes/stats.ts';
import { createSystemRouter } from './routes/system.ts';
import { createTransactionsRouter } from './routes/transactions.ts';

/**
 * Build the HTTP application over an already-loaded set of query services.
 */
export function createApp(services: QueryServices): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(express.json());

  app.get('/health', (_request, response) => {
    response.json({ status: 'ok' });
  });

  app.use('/api/transactions', createTransactionsRouter(services));
  app.use('/api/stats', createStatsRouter(services));
  app.use('/api/fraud', createFraudRouter(services));
  app.use('/api/customers', createCustomersRouter(services));
  app.use('/api/system', createSystemRouter(services));

  app.use((request, _response, next) => {
    next(new RouteNotFoundError(request.method, request.path));
  });
  app.use(errorHandler);

  return app;
}
