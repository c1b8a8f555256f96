import { DataLoadError, getErrorMessage, type Transaction } from '@tallyview/core';
import { getLogger } from '@tallyview/logger';
import { err, ok, type Result } from 'neverthrow';

import { TransactionIndex } from './transaction-index.ts';
import type { DateBounds, IndexName, StoreReader, StoreState, StoreWriter } from './types.ts';

const logger = getLogger('TransactionStore');

export type LoadFill<T, E> = (writer: StoreWriter) => Promise<Result<T, E>>;

/**
 * Shared handle on the live transaction generation.
 *
 * Bulk loads fill a private generation that replaces the live one only when
 * the fill succeeds, so readers never observe a partial load. Single-record
 * mutations apply to the live generation synchronously.
 */
export class TransactionStore implements StoreReader {
  private live = new TransactionIndex();
  private loadedAtValue: Date | undefined;
  private pending: Promise<unknown> = Promise.resolve();

  get state(): StoreState {
    return this.loadedAtValue ? 'loaded' : 'empty';
  }

  /** Time of the last successful bulk load. */
  get loadedAt(): Date | undefined {
    return this.loadedAtValue;
  }

  get size(): number {
    return this.live.size;
  }

  get dateBounds(): DateBounds | undefined {
    return this.live.dateBounds;
  }

  /**
   * Runs `fill` against a fresh generation and swaps it in on success.
   * Loads are serialized; a failed or throwing fill leaves the live data untouched.
   */
  load<T, E>(fill: LoadFill<T, E>): Promise<Result<T, E | DataLoadError>> {
    const run = this.pending.then(() => this.runLoad(fill));
    this.pending = run.catch(() => undefined);
    return run;
  }

  add(record: Transaction): void {
    this.live.add(record);
  }

  delete(id: string): boolean {
    return this.live.delete(id);
  }

  get(id: string): Transaction | undefined {
    return this.live.get(id);
  }

  getAll(): Transaction[] {
    return this.live.getAll();
  }

  getByAttribute(indexName: IndexName, value: string): Transaction[] {
    return this.live.getByAttribute(indexName, value);
  }

  getAttributeValues(indexName: IndexName): string[] {
    return this.live.getAttributeValues(indexName);
  }

  countByAttribute(indexName: IndexName, value: string): number {
    return this.live.countByAttribute(indexName, value);
  }

  getFraudulent(): Transaction[] {
    return this.live.getFraudulent();
  }

  private async runLoad<T, E>(fill: LoadFill<T, E>): Promise<Result<T, E | DataLoadError>> {
    const generation = new TransactionIndex();
    let result: Result<T, E>;
    try {
      result = await fill(generation);
    } catch (error) {
      logger.error({ error }, 'Bulk load threw; keeping previous data');
      return err(new DataLoadError(`Bulk load failed: ${getErrorMessage(error)}`, 'store', { cause: error }));
    }

    if (result.isErr()) {
      logger.warn('Bulk load failed; keeping previous data');
      return err(result.error);
    }

    this.live = generation;
    this.loadedAtValue = new Date();
    logger.info({ records: generation.size }, 'Store generation swapped in');
    return ok(result.value);
  }
}
