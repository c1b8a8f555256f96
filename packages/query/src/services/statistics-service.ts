import { AMOUNT_BUCKETS, averageOf, sumDecimals, type Transaction } from '@tallyview/core';
import type { StoreReader } from '@tallyview/store';
import { Decimal } from 'decimal.js';

import {
  systemClock,
  type AmountDistribution,
  type CategoryCodeStats,
  type Clock,
  type DailyStats,
  type OverviewStats,
} from './types.ts';

function totals(transactions: readonly Transaction[]): { totalAmount: Decimal; averageAmount: Decimal } {
  const totalAmount = sumDecimals(transactions.map((t) => t.amount));
  return { averageAmount: averageOf(totalAmount, transactions.length), totalAmount };
}

function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class StatisticsService {
  constructor(
    private readonly reader: StoreReader,
    private readonly clock: Clock = systemClock
  ) {}

  getOverview(): OverviewStats {
    const transactions = this.reader.getAll();
    const first = transactions[0];
    if (!first) {
      const now = this.clock();
      return { averageAmount: new Decimal(0), maxDate: now, minDate: now, totalAmount: new Decimal(0), totalCount: 0 };
    }

    let minDate = first.date;
    let maxDate = first.date;
    for (const { date } of transactions) {
      if (date.getTime() < minDate.getTime()) minDate = date;
      if (date.getTime() > maxDate.getTime()) maxDate = date;
    }

    return { ...totals(transactions), maxDate, minDate, totalCount: transactions.length };
  }

  getAmountDistribution(): AmountDistribution {
    const transactions = this.reader.getAll();
    const counts = AMOUNT_BUCKETS.map(() => 0);

    for (const { amount } of transactions) {
      const bucket = AMOUNT_BUCKETS.findIndex((b) => amount.gte(b.min) && amount.lt(b.max));
      if (bucket >= 0) counts[bucket] = (counts[bucket] ?? 0) + 1;
    }

    const totalCount = transactions.length;
    return {
      buckets: AMOUNT_BUCKETS.map((bucket, position) => {
        const count = counts[position] ?? 0;
        return { count, percentage: totalCount === 0 ? 0 : (count / totalCount) * 100, range: bucket.label };
      }),
    };
  }

  /** Per merchant category code, most frequent first. */
  getStatsByCategoryCode(): CategoryCodeStats[] {
    return this.reader
      .getAttributeValues('categoryCode')
      .map((mcc) => {
        const transactions = this.reader.getByAttribute('categoryCode', mcc);
        return { count: transactions.length, type: mcc, ...totals(transactions) };
      })
      .sort((a, b) => b.count - a.count);
  }

  /** Per UTC calendar day, oldest first. */
  getDailyStats(): DailyStats[] {
    const byDay = new Map<string, Transaction[]>();
    for (const transaction of this.reader.getAll()) {
      const day = utcDay(transaction.date);
      const bucket = byDay.get(day);
      if (bucket) {
        bucket.push(transaction);
      } else {
        byDay.set(day, [transaction]);
      }
    }

    return [...byDay.keys()].sort().map((day) => {
      const transactions = byDay.get(day) ?? [];
      return { count: transactions.length, date: day, ...totals(transactions) };
    });
  }
}
