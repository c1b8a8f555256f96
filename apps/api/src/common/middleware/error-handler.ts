import {
  getErrorMessage,
  InvalidPaginationError,
  InvalidSearchFiltersError,
  NotFoundError,
} from '@tallyview/core';
import { getLogger } from '@tallyview/logger';
import type { ErrorRequestHandler } from 'express';

import { BadRequestError, isBodyParseError, RouteNotFoundError } from '../request-errors.ts';

const logger = getLogger('HTTP');

export interface ErrorBody {
  error: string;
  details: string;
  path: string;
  timestamp: string;
}

interface ErrorMapping {
  status: number;
  error: string;
  details: string;
}

function mapError(exception: unknown): ErrorMapping {
  if (exception instanceof NotFoundError) {
    const resource = exception.resource.charAt(0).toUpperCase() + exception.resource.slice(1);
    return { details: exception.message, error: `${resource} not found`, status: 404 };
  }
  if (exception instanceof InvalidPaginationError) {
    return { details: exception.message, error: 'Invalid pagination parameters', status: 400 };
  }
  if (exception instanceof InvalidSearchFiltersError) {
    return { details: exception.message, error: 'Invalid search filters', status: 400 };
  }
  if (exception instanceof BadRequestError) {
    return { details: exception.message, error: exception.title, status: 400 };
  }
  if (isBodyParseError(exception)) {
    return { details: 'Request body is not valid JSON', error: 'Invalid request body', status: 400 };
  }
  if (exception instanceof RouteNotFoundError) {
    return { details: exception.message, error: 'Not found', status: 404 };
  }
  return { details: 'An unexpected error occurred', error: 'Internal server error', status: 500 };
}

/**
 * Final error middleware: maps typed errors to statuses and a uniform body.
 */
export const errorHandler: ErrorRequestHandler = (exception: unknown, request, response, _next) => {
  const { details, error, status } = mapError(exception);

  const context = { method: request.method, path: request.originalUrl, statusCode: status };
  if (status >= 500) {
    logger.error({ ...context, error: exception }, `Unhandled error: ${getErrorMessage(exception)}`);
  } else {
    logger.warn(context, details);
  }

  const body: ErrorBody = { details, error, path: request.originalUrl, timestamp: new Date().toISOString() };
  response.status(status).json(body);
};
