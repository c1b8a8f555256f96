import { getAppConfig } from '@tallyview/env';
import { loadTransactionsFromCsv } from '@tallyview/ingestion';
import { flushLoggers, getLogger } from '@tallyview/logger';
import { createQueryServices } from '@tallyview/query';
import { TransactionStore } from '@tallyview/store';

import { createApp } from './app.ts';

const logger = getLogger('Bootstrap');

async function bootstrap(): Promise<void> {
  const config = getAppConfig();
  logger.info({ dataFile: config.dataFile }, 'Starting transaction API');

  const store = new TransactionStore();
  const loaded = await loadTransactionsFromCsv(store, config.dataFile, {
    progressInterval: config.progressInterval,
  });
  if (loaded.isErr()) {
    logger.error({ error: loaded.error }, `Failed to load transaction data: ${loaded.error.message}`);
    flushLoggers();
    process.exitCode = 1;
    return;
  }

  const app = createApp(createQueryServices(store));
  const server = app.listen(config.port, () => {
    logger.info(`Application is running on: http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down transaction API');
    server.close(() => {
      flushLoggers();
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

bootstrap().catch((error: unknown) => {
  logger.fatal({ error }, 'Bootstrap failed');
  flushLoggers();
  process.exitCode = 1;
});
