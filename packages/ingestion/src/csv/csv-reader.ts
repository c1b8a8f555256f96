import fs from 'node:fs/promises';

import { DataLoadError, getErrorMessage } from '@tallyview/core';
import { getLogger } from '@tallyview/logger';
import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const logger = getLogger('csv-reader');

/** A CSV data row keyed by header name. Missing trailing cells are absent. */
export type CsvRow = Readonly<Record<string, string | undefined>>;

export const REQUIRED_COLUMNS = ['id', 'date', 'client_id', 'amount'] as const;

const CsvRecordsSchema = z.array(z.array(z.string()));

export interface CsvContents {
  headers: string[];
  rows: CsvRow[];
}

/**
 * Parse CSV text into header-keyed rows.
 * Fails when there is no header row or a required column is missing.
 */
export function parseCsvContent(content: string, source: string): Result<CsvContents, DataLoadError> {
  let parsed: unknown;
  try {
    parsed = parse(content, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    return err(new DataLoadError(`Malformed CSV in ${source}: ${getErrorMessage(error)}`, source, { cause: error }));
  }

  const records = CsvRecordsSchema.safeParse(parsed);
  if (!records.success) {
    return err(new DataLoadError(`Unexpected CSV structure in ${source}`, source, { cause: records.error }));
  }

  const [headers, ...data] = records.data;
  if (!headers || headers.every((header) => header === '')) {
    return err(new DataLoadError(`No header row in ${source}`, source));
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    return err(new DataLoadError(`Missing required columns in ${source}: ${missing.join(', ')}`, source));
  }

  const rows = data.map((cells) => {
    const row: Record<string, string | undefined> = {};
    headers.forEach((header, position) => {
      row[header] = cells[position];
    });
    return row;
  });

  return ok({ headers, rows });
}

/**
 * Read and parse a CSV file.
 */
export async function readCsvFile(filePath: string): Promise<Result<CsvContents, DataLoadError>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    logger.error({ error, filePath }, 'Failed to read CSV file');
    return err(new DataLoadError(`Cannot read ${filePath}: ${getErrorMessage(error)}`, filePath, { cause: error }));
  }

  return parseCsvContent(content, filePath);
}
