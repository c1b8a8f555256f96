import type { QueryServices } from '@tallyview/query';
import { Router } from 'express';

import { readIntegerParam, readPageQuery } from '../common/query-params.ts';
import { sendResult } from '../common/respond.ts';
import { presentCustomerDetails, presentTopCustomer } from '../presenters.ts';

export function createCustomersRouter({ customers }: QueryServices): Router {
  const router = Router();

  router.get('/', (request, response, next) => {
    const result = readPageQuery(request.query).andThen(({ limit, page }) => customers.listCustomers(page, limit));
    sendResult(response, next, result, (page) => page);
  });

  router.get('/top', (request, response, next) => {
    const result = readIntegerParam(request.query, 'n').andThen((n) => customers.getTopCustomers(n));
    sendResult(response, next, result, (top) => top.map(presentTopCustomer));
  });

  router.get('/:customerId', (request, response) => {
    response.json(presentCustomerDetails(customers.getCustomerDetails(request.params.customerId)));
  });

  return router;
}
