import type { ExitCode } from './exit-codes.ts';

/**
 * Standardized CLI response format for JSON output.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;
  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;
  /** Only present on success */
  data?: T | undefined;
  /** Only present on failure */
  error?:
    | {
        /** Machine-readable error code */
        code: string;
        message: string;
        details?: unknown;
        /** Stack trace (development only) */
        stack?: string | undefined;
      }
    | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: Record<string, unknown>): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };
  if (metadata) {
    response.metadata = metadata;
  }
  return response;
}

export function createErrorResponse(command: string, error: Error, code: string, details?: unknown): CLIResponse<never> {
  const errorObj: NonNullable<CLIResponse['error']> = { code, message: error.message };

  if (details !== undefined) {
    errorObj.details = details;
  }
  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

const ERROR_CODES: Record<ExitCode, string> = {
  0: 'SUCCESS',
  1: 'GENERAL_ERROR',
  2: 'INVALID_ARGS',
  4: 'NOT_FOUND',
  8: 'VALIDATION_ERROR',
};

export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return ERROR_CODES[exitCode];
}
