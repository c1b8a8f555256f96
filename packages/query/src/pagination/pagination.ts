import { DEFAULT_LIMIT, DEFAULT_PAGE, InvalidPaginationError, MAX_LIMIT, MIN_LIMIT } from '@tallyview/core';
import { err, ok, type Result } from 'neverthrow';

export interface PaginationParams {
  page: number;
  limit: number;
}

export interface PaginationMeta {
  page: number;
  limit: number;
  totalCount: number;
  totalPages: number;
  hasNextPage: boolean;
}

export interface PaginatedResponse<T> {
  data: T[];
  pagination: PaginationMeta;
}

/**
 * Check page/limit bounds. Omitted values take the defaults (page 1, limit 50).
 */
export function validatePaginationParams(
  page: number = DEFAULT_PAGE,
  limit: number = DEFAULT_LIMIT
): Result<PaginationParams, InvalidPaginationError> {
  if (!Number.isInteger(page) || page < 1) {
    return err(new InvalidPaginationError('Page must be >= 1', page, limit));
  }
  if (!Number.isInteger(limit) || limit < MIN_LIMIT || limit > MAX_LIMIT) {
    return err(new InvalidPaginationError(`Limit must be between ${MIN_LIMIT} and ${MAX_LIMIT}`, page, limit));
  }
  return ok({ limit, page });
}

/**
 * Attach pagination metadata to an already-sliced page of items.
 */
export function buildPaginatedResponse<T>(
  items: T[],
  page: number,
  limit: number,
  totalCount: number
): PaginatedResponse<T> {
  const totalPages = Math.floor((totalCount + limit - 1) / limit);
  return {
    data: items,
    pagination: {
      hasNextPage: page < totalPages,
      limit,
      page,
      totalCount,
      totalPages,
    },
  };
}

export function slicePage<T>(items: readonly T[], page: number, limit: number): T[] {
  const start = (page - 1) * limit;
  return items.slice(start, start + limit);
}

/**
 * Slice `items` to the requested page and wrap it in the envelope.
 */
export function paginate<T>(items: readonly T[], { page, limit }: PaginationParams): PaginatedResponse<T> {
  return buildPaginatedResponse(slicePage(items, page, limit), page, limit, items.length);
}
