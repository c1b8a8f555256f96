import type { Request } from 'express';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { BadRequestError } from './request-errors.ts';

const IntegerParamSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'must be an integer')
  .transform((val) => Number(val));

/**
 * Read an optional integer query parameter. Repeated or non-integer values fail.
 */
export function readIntegerParam(query: Request['query'], name: string): Result<number | undefined, BadRequestError> {
  const raw = query[name];
  if (raw === undefined || raw === '') {
    return ok(undefined);
  }
  const parsed = IntegerParamSchema.safeParse(raw);
  if (!parsed.success) {
    return err(new BadRequestError(`Query parameter "${name}" must be an integer`, 'Invalid query parameter'));
  }
  return ok(parsed.data);
}

export interface PageQuery {
  page: number | undefined;
  limit: number | undefined;
}

export function readPageQuery(query: Request['query']): Result<PageQuery, BadRequestError> {
  return readIntegerParam(query, 'page').andThen((page) =>
    readIntegerParam(query, 'limit').map((limit) => ({ limit, page }))
  );
}
