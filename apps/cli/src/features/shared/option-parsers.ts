import { err, ok, type Result } from 'neverthrow';

import { InvalidOptionError } from './cli-error.ts';

/**
 * Parse an optional integer option. Absent values stay undefined so service defaults apply.
 */
export function parseIntegerOption(value: string | undefined, option: string): Result<number | undefined, InvalidOptionError> {
  if (value === undefined) return ok(undefined);
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    return err(new InvalidOptionError(`Option --${option} must be an integer, got "${value}"`, option));
  }
  return ok(Number(trimmed));
}

export interface PageOptions {
  page?: string | undefined;
  limit?: string | undefined;
}

export function parsePageOptions(options: PageOptions): Result<{ page?: number | undefined; limit?: number | undefined }, InvalidOptionError> {
  return parseIntegerOption(options.page, 'page').andThen((page) =>
    parseIntegerOption(options.limit, 'limit').map((limit) => ({ limit, page }))
  );
}
