import { z } from 'zod';

import { AmountSchema, DateSchema } from './amount.ts';

const OptionalFlagSchema = z
  .string()
  .nullish()
  .transform((val) => {
    const trimmed = val?.trim();
    return trimmed ? trimmed : undefined;
  });

/**
 * Programmatic transaction input (JSON bodies, fixtures). CSV rows go through
 * the ingestion row parser instead, which knows the source column names.
 */
export const TransactionSchema = z.object({
  id: z.string().trim().min(1, 'Transaction id must not be empty'),
  date: DateSchema,
  customerId: z.string().trim(),
  cardId: z.string().trim().default(''),
  amount: AmountSchema,
  channelType: z.string().trim().default(''),
  merchantId: z.string().trim().default(''),
  merchantCity: z.string().trim().default(''),
  merchantState: z.string().trim().default(''),
  zip: z.string().trim().default(''),
  mcc: z.string().trim().default(''),
  errors: OptionalFlagSchema,
});

export type TransactionInput = z.input<typeof TransactionSchema>;

/**
 * The fields the fraud heuristic looks at. Anything else in the body is ignored.
 */
export const FraudPredictionInputSchema = z.object({
  amount: AmountSchema,
  channelType: z.string().trim().nullish().transform((val) => val ?? ''),
  errors: OptionalFlagSchema,
});

export type FraudPredictionInput = z.output<typeof FraudPredictionInputSchema>;
