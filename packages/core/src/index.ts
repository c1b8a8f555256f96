export * from './constants.ts';
export * from './errors/errors.ts';
export * from './types/transaction.ts';
export * from './schemas/amount.ts';
export * from './schemas/transaction.ts';
export * from './utils/decimal-utils.ts';
export * from './utils/type-guard-utils.ts';
export * from './utils/zod-utils.ts';
