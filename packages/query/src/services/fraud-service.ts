import { formatDecimal, isFraudulent, sumDecimals, type FraudPredictionInput } from '@tallyview/core';
import type { StoreReader } from '@tallyview/store';

import type { ChannelFraudStats, FraudPrediction, FraudSummary } from './types.ts';

export const NO_FRAUD_INDICATORS = 'No fraud indicators detected';

// Scores are summed in tenths so 0.8 + 0.1 stays exactly 0.9
const ERROR_FLAG_WEIGHT = 8;
const VERY_HIGH_AMOUNT_WEIGHT = 2;
const HIGH_AMOUNT_WEIGHT = 1;
const MISSING_CHANNEL_WEIGHT = 1;
const VERY_HIGH_AMOUNT = 5000;
const HIGH_AMOUNT = 2000;

export class FraudService {
  constructor(private readonly reader: StoreReader) {}

  getSummary(): FraudSummary {
    const flagged = this.reader.getFraudulent();
    const totalCount = this.reader.size;
    return {
      fraudRate: totalCount === 0 ? 0 : flagged.length / totalCount,
      totalFraudAmount: sumDecimals(flagged.map((t) => t.amount)),
      totalFraudCount: flagged.length,
    };
  }

  /** Fraud rate per payment channel, highest rate first. */
  getStatsByChannelType(): ChannelFraudStats[] {
    return this.reader
      .getAttributeValues('channelType')
      .map((type) => {
        const transactions = this.reader.getByAttribute('channelType', type);
        const fraudCount = transactions.filter(isFraudulent).length;
        return {
          fraudCount,
          fraudRate: transactions.length === 0 ? 0 : fraudCount / transactions.length,
          totalCount: transactions.length,
          type,
        };
      })
      .sort((a, b) => b.fraudRate - a.fraudRate);
  }

  /**
   * Fixed rule-based score in [0, 1]. Indicators are reported in check order.
   */
  predict(input: FraudPredictionInput): FraudPrediction {
    let tenths = 0;
    const indicators: string[] = [];

    if (input.errors) {
      tenths += ERROR_FLAG_WEIGHT;
      indicators.push(`Transaction has error flag: ${input.errors}`);
    }

    if (input.amount.gt(VERY_HIGH_AMOUNT)) {
      tenths += VERY_HIGH_AMOUNT_WEIGHT;
      indicators.push(`Very high amount: ${formatDecimal(input.amount)}`);
    } else if (input.amount.gt(HIGH_AMOUNT)) {
      tenths += HIGH_AMOUNT_WEIGHT;
      indicators.push(`High amount: ${formatDecimal(input.amount)}`);
    }

    if (input.channelType.trim() === '') {
      tenths += MISSING_CHANNEL_WEIGHT;
      indicators.push('Missing channel type');
    }

    return {
      fraudScore: Math.min(Math.max(tenths, 0), 10) / 10,
      reasoning: indicators.length > 0 ? indicators.join('; ') : NO_FRAUD_INDICATORS,
    };
  }
}
