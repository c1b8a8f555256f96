import { formatZodIssues, FraudPredictionInputSchema, fromZod } from '@tallyview/core';
import type { QueryServices } from '@tallyview/query';
import { Router } from 'express';

import { BadRequestError } from '../common/request-errors.ts';
import { sendResult } from '../common/respond.ts';
import { presentFraudSummary } from '../presenters.ts';

export function createFraudRouter({ fraud }: QueryServices): Router {
  const router = Router();

  router.get('/summary', (_request, response) => {
    response.json(presentFraudSummary(fraud.getSummary()));
  });

  router.get('/by-type', (_request, response) => {
    response.json(fraud.getStatsByChannelType());
  });

  router.post('/predict', (request, response, next) => {
    const body: unknown = request.body;
    const result = fromZod(FraudPredictionInputSchema, body)
      .mapErr((error) => {
        const details = formatZodIssues(error)
          .map((issue) => `${issue.path}: ${issue.message}`)
          .join('; ');
        return new BadRequestError(details, 'Invalid transaction');
      })
      .map((input) => fraud.predict(input));
    sendResult(response, next, result, (prediction) => prediction);
  });

  return router;
}
