import type { Transaction } from '@tallyview/core';

/** Secondary indexes kept by the store, keyed by record attribute. */
export type IndexName = 'customer' | 'merchant' | 'categoryCode' | 'channelType';

export const INDEX_NAMES: readonly IndexName[] = ['customer', 'merchant', 'categoryCode', 'channelType'];

export interface DateBounds {
  minDate: Date;
  maxDate: Date;
}

export type StoreState = 'empty' | 'loaded';

/**
 * Read side of the store. Unknown keys give empty results, never errors.
 */
export interface StoreReader {
  readonly size: number;
  readonly dateBounds: DateBounds | undefined;
  get(id: string): Transaction | undefined;
  getAll(): Transaction[];
  getByAttribute(indexName: IndexName, value: string): Transaction[];
  getAttributeValues(indexName: IndexName): string[];
  countByAttribute(indexName: IndexName, value: string): number;
  getFraudulent(): Transaction[];
}

/**
 * Write-only handle given to bulk loaders.
 */
export interface StoreWriter {
  readonly size: number;
  add(record: Transaction): void;
}
