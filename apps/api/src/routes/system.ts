import type { QueryServices } from '@tallyview/query';
import { Router } from 'express';

import { presentHealth, presentMetadata } from '../presenters.ts';

export function createSystemRouter({ health }: QueryServices): Router {
  const router = Router();

  router.get('/health', (_request, response) => {
    response.json(presentHealth(health.checkHealth()));
  });

  router.get('/metadata', (_request, response) => {
    response.json(presentMetadata(health.getMetadata()));
  });

  return router;
}
