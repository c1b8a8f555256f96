import { randomUUID } from 'node:crypto';

import { getLogger } from '@tallyview/logger';
import type { Request, RequestHandler } from 'express';

const logger = getLogger('HTTP');

export const CORRELATION_HEADER = 'x-correlation-id';

function extractOrGenerateCorrelationId(request: Request): string {
  const header = request.headers[CORRELATION_HEADER] ?? request.headers['x-request-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value?.trim() || randomUUID();
}

function getClientIp(request: Request): string {
  const forwarded = request.headers['x-forwarded-for'];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(',')[0]?.trim();
  return first || request.socket.remoteAddress || 'unknown';
}

/**
 * Logs request start and completion with duration; echoes the correlation id.
 */
export const requestLogger: RequestHandler = (request, response, next) => {
  const startTime = performance.now();
  const correlationId = extractOrGenerateCorrelationId(request);
  response.setHeader(CORRELATION_HEADER, correlationId);

  logger.info(
    {
      correlationId,
      ip: getClientIp(request),
      method: request.method,
      path: request.path,
      type: 'request_start',
      userAgent: request.headers['user-agent'],
    },
    'HTTP request'
  );

  response.on('finish', () => {
    logger.info(
      {
        correlationId,
        duration: Math.round(performance.now() - startTime),
        method: request.method,
        path: request.path,
        statusCode: response.statusCode,
        type: 'request_complete',
      },
      'HTTP response'
    );
  });

  next();
};
