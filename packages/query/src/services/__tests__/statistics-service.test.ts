import { describe, expect, it } from 'vitest';

import { fixedClock, makeTransaction, storeWith, threeRecordStore } from '../../__tests__/test-fixtures.ts';
import { StatisticsService } from '../statistics-service.ts';

describe('StatisticsService', () => {
  describe('getOverview', () => {
    it('summarizes counts, amounts and date range', () => {
      const overview = new StatisticsService(threeRecordStore()).getOverview();

      expect(overview.totalCount).toBe(3);
      expect(overview.totalAmount.toNumber()).toBe(450);
      expect(overview.averageAmount.toNumber()).toBe(150);
      expect(overview.minDate.toISOString()).toBe('2023-01-01T00:00:00.000Z');
      expect(overview.maxDate.toISOString()).toBe('2023-01-03T00:00:00.000Z');
    });

    it('uses the clock for an empty store', () => {
      const overview = new StatisticsService(storeWith(), fixedClock).getOverview();

      expect(overview.totalCount).toBe(0);
      expect(overview.totalAmount.isZero()).toBe(true);
      expect(overview.averageAmount.isZero()).toBe(true);
      expect(overview.minDate).toEqual(fixedClock());
      expect(overview.maxDate).toEqual(fixedClock());
    });
  });

  describe('getAmountDistribution', () => {
    it('assigns amounts to half-open buckets', () => {
      const store = storeWith(
        makeTransaction({ amount: 0, id: 'a' }),
        makeTransaction({ amount: 99.99, id: 'b' }),
        makeTransaction({ amount: 100, id: 'c' }),
        makeTransaction({ amount: 1000, id: 'd' })
      );

      expect(new StatisticsService(store).getAmountDistribution().buckets).toEqual([
        { count: 2, percentage: 50, range: '0-100' },
        { count: 1, percentage: 25, range: '100-500' },
        { count: 0, percentage: 0, range: '500-1000' },
        { count: 1, percentage: 25, range: '1000+' },
      ]);
    });

    it('reports zero buckets for an empty store', () => {
      const buckets = new StatisticsService(storeWith()).getAmountDistribution().buckets;

      expect(buckets.map((b) => b.range)).toEqual(['0-100', '100-500', '500-1000', '1000+']);
      expect(buckets.every((b) => b.count === 0 && b.percentage === 0)).toBe(true);
    });
  });

  describe('getStatsByCategoryCode', () => {
    it('groups by merchant category code, most frequent first', () => {
      const store = storeWith(
        makeTransaction({ amount: 10, id: 'a', mcc: '5812' }),
        makeTransaction({ amount: 20, id: 'b', mcc: '5411' }),
        makeTransaction({ amount: 40, id: 'c', mcc: '5411' })
      );

      const stats = new StatisticsService(store).getStatsByCategoryCode();

      expect(stats.map((s) => [s.type, s.count, s.totalAmount.toNumber(), s.averageAmount.toNumber()])).toEqual([
        ['5411', 2, 60, 30],
        ['5812', 1, 10, 10],
      ]);
    });
  });

  describe('getDailyStats', () => {
    it('groups by UTC day in ascending order', () => {
      const store = storeWith(
        makeTransaction({ amount: 30, date: '2023-01-02T23:59:59Z', id: 'a' }),
        makeTransaction({ amount: 10, date: '2023-01-01T08:00:00Z', id: 'b' }),
        makeTransaction({ amount: 50, date: '2023-01-02T00:00:00Z', id: 'c' })
      );

      const stats = new StatisticsService(store).getDailyStats();

      expect(stats.map((s) => [s.date, s.count, s.totalAmount.toNumber(), s.averageAmount.toNumber()])).toEqual([
        ['2023-01-01', 1, 10, 10],
        ['2023-01-02', 2, 80, 40],
      ]);
    });
  });
});
