#!/usr/bin/env node
import { flushLoggers, getLogger } from '@tallyview/logger';

import { createProgram } from './program.ts';

const logger = getLogger('CLI');

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  logger.error(`Stack: ${error.stack}`);
  process.exit(1);
});

createProgram()
  .parseAsync()
  .then(() => flushLoggers())
  .catch((error: unknown) => {
    logger.error(`CLI failed: ${String(error)}`);
    process.exit(1);
  });
