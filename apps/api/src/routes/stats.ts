import type { QueryServices } from '@tallyview/query';
import { Router } from 'express';

import { presentAmountStats, presentOverview } from '../presenters.ts';

export function createStatsRouter({ statistics }: QueryServices): Router {
  const router = Router();

  router.get('/overview', (_request, response) => {
    response.json(presentOverview(statistics.getOverview()));
  });

  router.get('/amount-distribution', (_request, response) => {
    response.json(statistics.getAmountDistribution());
  });

  router.get('/by-type', (_request, response) => {
    response.json(statistics.getStatsByCategoryCode().map(presentAmountStats));
  });

  router.get('/daily', (_request, response) => {
    response.json(statistics.getDailyStats().map(presentAmountStats));
  });

  return router;
}
