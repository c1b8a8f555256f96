import type { DataLoadError } from '@tallyview/core';
import { getLogger } from '@tallyview/logger';
import type { StoreWriter, TransactionStore } from '@tallyview/store';
import { err, ok, type Result } from 'neverthrow';

import { readCsvFile, type CsvRow } from './csv-reader.ts';
import { parseTransactionRow } from './row-parser.ts';

const logger = getLogger('transaction-loader');

export const DEFAULT_PROGRESS_INTERVAL = 10_000;

export interface LoadOptions {
  /** Log progress every N loaded rows. */
  progressInterval?: number | undefined;
}

export interface LoadSummary {
  loaded: number;
  skipped: number;
  failed: number;
  durationMs: number;
}

/**
 * Feed parsed rows into a store writer. Rows without an id are skipped;
 * rows that fail to parse are counted and logged, never propagated.
 */
export function writeRows(
  writer: StoreWriter,
  rows: readonly CsvRow[],
  progressInterval = DEFAULT_PROGRESS_INTERVAL
): Omit<LoadSummary, 'durationMs'> {
  let loaded = 0;
  let skipped = 0;
  let failed = 0;

  rows.forEach((row, position) => {
    const rowNumber = position + 1;
    if (!row['id']?.trim()) {
      skipped++;
      return;
    }

    const result = parseTransactionRow(row, rowNumber);
    if (result.isErr()) {
      failed++;
      logger.warn({ field: result.error.field, rowNumber }, `Skipping row: ${result.error.message}`);
      return;
    }

    writer.add(result.value);
    loaded++;
    if (loaded % progressInterval === 0) {
      logger.info({ loaded, total: rows.length }, 'Loading transactions');
    }
  });

  return { failed, loaded, skipped };
}

/**
 * Load a transactions CSV into the store as one bulk load.
 * An unreadable or headerless file leaves the store's current data in place.
 */
export async function loadTransactionsFromCsv(
  store: TransactionStore,
  filePath: string,
  options: LoadOptions = {}
): Promise<Result<LoadSummary, DataLoadError>> {
  const startTime = performance.now();
  logger.info({ filePath }, 'Loading transactions from CSV');

  const result = await store.load(async (writer) => {
    const contents = await readCsvFile(filePath);
    return contents.map(({ rows }) => writeRows(writer, rows, options.progressInterval));
  });

  if (result.isErr()) {
    logger.error({ error: result.error, filePath }, 'Transaction load failed');
    return err(result.error);
  }

  const summary: LoadSummary = { ...result.value, durationMs: Math.round(performance.now() - startTime) };
  logger.info(summary, 'Transactions loaded');
  return ok(summary);
}
