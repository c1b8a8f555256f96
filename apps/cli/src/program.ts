import { API_VERSION } from '@tallyview/core';
import { Command } from 'commander';

import { registerCustomersCommand } from './features/customers/customers.ts';
import { registerFraudCommand } from './features/fraud/fraud.ts';
import { registerStatsCommand } from './features/stats/stats.ts';
import { registerSystemCommand } from './features/system/system.ts';
import { registerTransactionsCommand } from './features/transactions/transactions.ts';

/**
 * Build the command tree. Every command loads the CSV into a fresh store and runs one query.
 */
export function createProgram(): Command {
  const program = new Command();
  program.name('tallyview').description('Query card transactions loaded from a CSV file').version(API_VERSION);

  registerTransactionsCommand(program);
  registerStatsCommand(program);
  registerFraudCommand(program);
  registerCustomersCommand(program);
  registerSystemCommand(program);

  return program;
}
