import { toError } from '@tallyview/core';
import { loadAppConfig } from '@tallyview/env';
import { loadTransactionsFromCsv, type LoadSummary } from '@tallyview/ingestion';
import { setLoggerTransports } from '@tallyview/logger';
import { createQueryServices, type QueryServices } from '@tallyview/query';
import { TransactionStore } from '@tallyview/store';
import type { Command } from 'commander';
import { err, type Result } from 'neverthrow';

import { exitCodeForError } from './error-mapping.ts';
import { OutputManager } from './output.ts';

/**
 * Options every query command accepts.
 */
export interface CommonCommandOptions {
  file?: string | undefined;
  json?: boolean | undefined;
  verbose?: boolean | undefined;
}

export interface QueryCommand<T> {
  /** Command name reported in the JSON envelope, e.g. "stats-overview". */
  name: string;
  execute(services: QueryServices): Result<T, Error>;
  formatText(data: T): string;
}

async function loadServices(
  options: CommonCommandOptions,
  output: OutputManager
): Promise<Result<{ services: QueryServices; summary: LoadSummary }, Error>> {
  const config = loadAppConfig();
  if (config.isErr()) {
    return err(config.error);
  }

  const filePath = options.file ?? config.value.dataFile;
  const store = new TransactionStore();
  const spinner = output.spinner();
  spinner?.start(`Loading transactions from ${filePath}`);

  const loaded = await loadTransactionsFromCsv(store, filePath, { progressInterval: config.value.progressInterval });
  spinner?.stop(loaded.isOk() ? `Loaded ${loaded.value.loaded} transactions` : 'Failed to load transactions');

  return loaded.map((summary) => ({ services: createQueryServices(store), summary }));
}

/**
 * Load the CSV into a fresh store, run one query and print its result.
 */
export async function runQueryCommand<T>(command: QueryCommand<T>, options: CommonCommandOptions): Promise<void> {
  const output = new OutputManager(options.json ? 'json' : 'text');
  // Log lines would corrupt JSON output and clutter tables
  setLoggerTransports({ console: Boolean(options.verbose) && !options.json });

  try {
    const loaded = await loadServices(options, output);
    if (loaded.isErr()) {
      output.error(command.name, loaded.error, exitCodeForError(loaded.error));
      return;
    }

    const { services, summary } = loaded.value;
    command.execute(services).match(
      (data) => {
        output.success(command.name, data, command.formatText(data), {
          loaded: summary.loaded,
          skipped: summary.skipped + summary.failed,
        });
      },
      (error) => {
        output.error(command.name, error, exitCodeForError(error));
      }
    );
  } catch (error) {
    output.error(command.name, toError(error));
  }
}

/**
 * Attach --file, --json and --verbose to a query subcommand.
 */
export function withCommonOptions(command: Command): Command {
  return command
    .option('--file <path>', 'Transactions CSV to load (defaults to TALLYVIEW_DATA_FILE)')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Show log output');
}

/**
 * Attach --page and --limit to a paged query subcommand.
 */
export function withPageOptions(command: Command): Command {
  return command.option('--page <number>', 'Page number (default 1)').option('--limit <number>', 'Page size, 1-1000 (default 50)');
}
