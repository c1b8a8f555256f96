import { normalizeSearchFilters, type QueryServices } from '@tallyview/query';
import { Router } from 'express';

import { readIntegerParam, readPageQuery } from '../common/query-params.ts';
import { sendResult } from '../common/respond.ts';
import { presentPage, presentTransaction } from '../presenters.ts';

export function createTransactionsRouter({ transactions }: QueryServices): Router {
  const router = Router();

  router.get('/', (request, response, next) => {
    const result = readPageQuery(request.query).andThen(({ limit, page }) =>
      transactions.listTransactions(page, limit)
    );
    sendResult(response, next, result, (page) => presentPage(page, presentTransaction));
  });

  router.get('/recent', (request, response, next) => {
    const result = readIntegerParam(request.query, 'limit').andThen((limit) =>
      transactions.getRecentTransactions(limit)
    );
    sendResult(response, next, result, (page) => presentPage(page, presentTransaction));
  });

  router.get('/types', (_request, response) => {
    response.json(transactions.getChannelTypeCounts());
  });

  router.post('/search', (request, response, next) => {
    const body: unknown = request.body;
    const result = readPageQuery(request.query).andThen(({ limit, page }) =>
      normalizeSearchFilters(body).andThen((criteria) => transactions.searchTransactions(criteria, page, limit))
    );
    sendResult(response, next, result, (page) => presentPage(page, presentTransaction));
  });

  router.get('/by-customer/:customerId', (request, response, next) => {
    const result = readPageQuery(request.query).andThen(({ limit, page }) =>
      transactions.getCustomerTransactions(request.params.customerId, page, limit)
    );
    sendResult(response, next, result, (page) => presentPage(page, presentTransaction));
  });

  router.get('/by-merchant/:merchantId', (request, response, next) => {
    const result = readPageQuery(request.query).andThen(({ limit, page }) =>
      transactions.getMerchantTransactions(request.params.merchantId, page, limit)
    );
    sendResult(response, next, result, (page) => presentPage(page, presentTransaction));
  });

  router.get('/:id', (request, response, next) => {
    sendResult(response, next, transactions.getTransaction(request.params.id), presentTransaction);
  });

  router.delete('/:id', (request, response, next) => {
    transactions.deleteTransaction(request.params.id).match(
      () => {
        response.status(204).end();
      },
      (error) => next(error)
    );
  });

  return router;
}
