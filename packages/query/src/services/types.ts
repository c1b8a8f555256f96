import type { Decimal } from 'decimal.js';

/** Source of "now" for empty-store fallbacks. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface OverviewStats {
  totalCount: number;
  totalAmount: Decimal;
  averageAmount: Decimal;
  minDate: Date;
  maxDate: Date;
}

export interface AmountBucket {
  range: string;
  count: number;
  percentage: number;
}

export interface AmountDistribution {
  buckets: AmountBucket[];
}

export interface CategoryCodeStats {
  type: string;
  count: number;
  totalAmount: Decimal;
  averageAmount: Decimal;
}

export interface DailyStats {
  /** UTC calendar day, YYYY-MM-DD */
  date: string;
  count: number;
  totalAmount: Decimal;
  averageAmount: Decimal;
}

export interface FraudSummary {
  totalFraudCount: number;
  fraudRate: number;
  totalFraudAmount: Decimal;
}

export interface ChannelFraudStats {
  type: string;
  fraudCount: number;
  totalCount: number;
  fraudRate: number;
}

export interface FraudPrediction {
  fraudScore: number;
  reasoning: string;
}

export interface CustomerSummary {
  customerId: string;
  transactionCount: number;
}

export interface CustomerDetails {
  customerId: string;
  transactionCount: number;
  totalAmount: Decimal;
  averageAmount: Decimal;
}

export interface TopCustomer {
  customerId: string;
  transactionCount: number;
  totalAmount: Decimal;
}

export interface ChannelTypeCount {
  type: string;
  count: number;
}

export type HealthState = 'healthy' | 'unhealthy';

export interface HealthStatus {
  status: HealthState;
  responseTimeMs: number;
  timestamp: Date;
}

export interface SystemMetadata {
  totalTransactionCount: number;
  dataLoadDate: Date;
  apiVersion: string;
  minDate: Date;
  maxDate: Date;
}
