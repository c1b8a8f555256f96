import {
  formatZodIssues,
  InvalidSearchFiltersError,
  parseCurrencyAmount,
  SEARCH_PLACEHOLDER,
} from '@tallyview/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

function isAbsentText(value: string): boolean {
  return value === '' || value === SEARCH_PLACEHOLDER;
}

// Form clients send "" or the literal "string" for fields left blank.
// Anything else is compared verbatim.
const TextCriterionSchema = z
  .string()
  .nullish()
  .transform((val) => (val === null || val === undefined || isAbsentText(val) ? undefined : val));

const AmountBoundSchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((val, ctx) => {
    if (val === null || val === undefined) return undefined;
    if (typeof val === 'string' && isAbsentText(val.trim())) return undefined;

    const parsed =
      typeof val === 'number' ? (Number.isFinite(val) ? new Decimal(val) : undefined) : parseCurrencyAmount(val);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount bound must be a finite number' });
      return z.NEVER;
    }
    return parsed;
  });

export const SearchFiltersSchema = z.object({
  channelType: TextCriterionSchema,
  customerId: TextCriterionSchema,
  maxAmount: AmountBoundSchema,
  merchantCity: TextCriterionSchema,
  minAmount: AmountBoundSchema,
  transactionId: TextCriterionSchema,
});

/** Raw criteria as received from a transport. Every field is optional. */
export type SearchFiltersInput = z.input<typeof SearchFiltersSchema>;

/** Normalized criteria: a field is either present or undefined. */
export type SearchCriteria = z.output<typeof SearchFiltersSchema>;

/**
 * Normalize raw filters at the boundary so the engine only sees present or absent values.
 */
export function normalizeSearchFilters(input: unknown): Result<SearchCriteria, InvalidSearchFiltersError> {
  const parsed = SearchFiltersSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
    return err(new InvalidSearchFiltersError(`Invalid search filters: ${summary}`, issues));
  }
  return ok(parsed.data);
}
