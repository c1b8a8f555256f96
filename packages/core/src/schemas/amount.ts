import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { parseCurrencyAmount } from '../utils/decimal-utils.ts';

// Accepts a number, a numeric string (optionally "$"-prefixed) or a Decimal instance
// and transforms to Decimal. Non-numeric text fails validation instead of becoming zero.
export const DecimalSchema = z
  .union([z.string(), z.number(), z.instanceof(Decimal)])
  .transform((val, ctx) => {
    if (val instanceof Decimal) return val;
    const parsed = parseCurrencyAmount(String(val));
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a valid numeric string or number' });
      return z.NEVER;
    }
    return parsed;
  });

// Piped so the sign check only sees successfully parsed values
export const AmountSchema = DecimalSchema.pipe(
  z.instanceof(Decimal).refine((val) => !val.isNegative(), { message: 'Amount must not be negative' })
);

// Accepts a Date instance, an ISO 8601 string or a Unix timestamp in milliseconds
export const DateSchema = z
  .union([
    z.number().int().nonnegative(),
    z.string().refine((val) => !isNaN(Date.parse(val)), { message: 'Invalid date string' }),
    z.date(),
  ])
  .transform((val) => (val instanceof Date ? val : new Date(val)));
