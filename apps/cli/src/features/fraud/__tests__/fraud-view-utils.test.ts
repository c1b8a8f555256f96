import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { parsePredictionInput } from '../fraud.ts';
import { formatChannelFraudStats, formatFraudPrediction, formatFraudSummary } from '../fraud-view-utils.ts';

describe('formatFraudSummary', () => {
  it('prints count, rate and amount', () => {
    expect(
      formatFraudSummary({ fraudRate: 1 / 3, totalFraudAmount: new Decimal(150), totalFraudCount: 1 })
    ).toBe('Flagged transactions: 1\nFraud rate:           33.33%\nFlagged amount:       $150.00');
  });
});

describe('formatChannelFraudStats', () => {
  it('prints a row per channel', () => {
    expect(
      formatChannelFraudStats([{ fraudCount: 1, fraudRate: 0.5, totalCount: 2, type: 'Chip Transaction' }]).split('\n')[2]
    ).toBe('Chip Transaction  1        2      50.00%');
  });
});

describe('formatFraudPrediction', () => {
  it('prints the score with one decimal', () => {
    expect(formatFraudPrediction({ fraudScore: 0.9, reasoning: 'Transaction has error flag: Bad PIN' })).toBe(
      'Fraud score: 0.9\nReasoning:   Transaction has error flag: Bad PIN'
    );
  });
});

describe('parsePredictionInput', () => {
  it('accepts a dollar-prefixed amount', () => {
    const input = parsePredictionInput({ amount: '$2500.00', channelType: 'Online Transaction' })._unsafeUnwrap();

    expect(input.amount.toString()).toBe('2500');
    expect(input.channelType).toBe('Online Transaction');
    expect(input.errors).toBeUndefined();
  });

  it('reports invalid amounts against the amount field', () => {
    const error = parsePredictionInput({ amount: '-5' })._unsafeUnwrapErr();

    expect(error.name).toBe('InvalidInputError');
    expect(error.issues).toEqual([{ message: 'Amount must not be negative', path: 'amount' }]);
  });
});
