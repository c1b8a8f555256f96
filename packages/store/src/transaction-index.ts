import { isFraudulent, type Transaction } from '@tallyview/core';

import { INDEX_NAMES, type DateBounds, type IndexName, type StoreReader, type StoreWriter } from './types.ts';

const attributeOf: Record<IndexName, (record: Transaction) => string> = {
  categoryCode: (record) => record.mcc,
  channelType: (record) => record.channelType,
  customer: (record) => record.customerId,
  merchant: (record) => record.merchantId,
};

/**
 * One generation of records plus its secondary indexes.
 *
 * Index slots are insertion-ordered Sets so membership changes stay O(1).
 * A slot emptied by a delete is dropped from its index.
 */
export class TransactionIndex implements StoreReader, StoreWriter {
  private readonly records = new Map<string, Transaction>();
  private readonly indexes: Record<IndexName, Map<string, Set<string>>> = {
    categoryCode: new Map(),
    channelType: new Map(),
    customer: new Map(),
    merchant: new Map(),
  };
  private readonly fraudIds = new Set<string>();
  private bounds: DateBounds | undefined;

  get size(): number {
    return this.records.size;
  }

  /**
   * Bounds only ever widen; deletes leave them as they were.
   */
  get dateBounds(): DateBounds | undefined {
    return this.bounds;
  }

  add(record: Transaction): void {
    // Last write wins: drop the previous record's memberships first
    if (this.records.has(record.id)) {
      this.unlink(record.id);
    }

    this.records.set(record.id, record);
    for (const name of INDEX_NAMES) {
      const slots = this.indexes[name];
      const value = attributeOf[name](record);
      let slot = slots.get(value);
      if (!slot) {
        slot = new Set();
        slots.set(value, slot);
      }
      slot.add(record.id);
    }
    if (isFraudulent(record)) {
      this.fraudIds.add(record.id);
    }
    this.extendBounds(record.date);
  }

  delete(id: string): boolean {
    if (!this.records.has(id)) {
      return false;
    }
    this.unlink(id);
    return true;
  }

  get(id: string): Transaction | undefined {
    return this.records.get(id);
  }

  getAll(): Transaction[] {
    return [...this.records.values()];
  }

  getByAttribute(indexName: IndexName, value: string): Transaction[] {
    const slot = this.indexes[indexName].get(value);
    return slot ? this.resolve(slot) : [];
  }

  getAttributeValues(indexName: IndexName): string[] {
    return [...this.indexes[indexName].keys()];
  }

  countByAttribute(indexName: IndexName, value: string): number {
    return this.indexes[indexName].get(value)?.size ?? 0;
  }

  getFraudulent(): Transaction[] {
    return this.resolve(this.fraudIds);
  }

  private unlink(id: string): void {
    const record = this.records.get(id);
    if (!record) return;

    for (const name of INDEX_NAMES) {
      const slots = this.indexes[name];
      const value = attributeOf[name](record);
      const slot = slots.get(value);
      if (!slot) continue;
      slot.delete(id);
      if (slot.size === 0) {
        slots.delete(value);
      }
    }
    this.fraudIds.delete(id);
    this.records.delete(id);
  }

  private resolve(ids: Iterable<string>): Transaction[] {
    const result: Transaction[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) result.push(record);
    }
    return result;
  }

  private extendBounds(date: Date): void {
    if (!this.bounds) {
      this.bounds = { maxDate: date, minDate: date };
      return;
    }
    if (date.getTime() < this.bounds.minDate.getTime()) {
      this.bounds = { ...this.bounds, minDate: date };
    }
    if (date.getTime() > this.bounds.maxDate.getTime()) {
      this.bounds = { ...this.bounds, maxDate: date };
    }
  }
}
