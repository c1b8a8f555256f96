import type { Decimal } from 'decimal.js';

/**
 * A single card transaction as held by the store. Records are never mutated
 * after insertion; replacing one means re-adding under the same id.
 */
export interface Transaction {
  readonly id: string;
  readonly date: Date;
  readonly customerId: string;
  readonly cardId: string;
  readonly amount: Decimal;
  /** Payment channel descriptor, e.g. "Swipe Transaction". May be empty. */
  readonly channelType: string;
  readonly merchantId: string;
  readonly merchantCity: string;
  readonly merchantState: string;
  readonly zip: string;
  /** Merchant category code */
  readonly mcc: string;
  /** Error flag; any non-empty value marks the transaction as fraudulent */
  readonly errors?: string | undefined;
}

export function isFraudulent(transaction: Pick<Transaction, 'errors'>): boolean {
  return transaction.errors !== undefined && transaction.errors.length > 0;
}
