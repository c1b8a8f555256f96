export const API_VERSION = '1.0.0';

export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 50;
export const MIN_LIMIT = 1;
export const MAX_LIMIT = 1000;

/**
 * Value some API clients send for untouched string fields (the OpenAPI example
 * placeholder). Treated the same as an absent filter.
 */
export const SEARCH_PLACEHOLDER = 'string';

export interface AmountBucketDefinition {
  label: string;
  min: number;
  /** Exclusive upper bound */
  max: number;
}

export const AMOUNT_BUCKETS: readonly AmountBucketDefinition[] = [
  { label: '0-100', min: 0, max: 100 },
  { label: '100-500', min: 100, max: 500 },
  { label: '500-1000', min: 500, max: 1000 },
  { label: '1000+', min: 1000, max: Number.POSITIVE_INFINITY },
];
