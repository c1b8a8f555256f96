import { InvalidPaginationError, InvalidSearchFiltersError, NotFoundError } from '@tallyview/core';

import { InvalidInputError, InvalidOptionError } from './cli-error.ts';
import { ExitCodes, type ExitCode } from './exit-codes.ts';

/**
 * Exit code for a failed command, by error class.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof NotFoundError) return ExitCodes.NOT_FOUND;
  if (error instanceof InvalidPaginationError || error instanceof InvalidOptionError) return ExitCodes.INVALID_ARGS;
  if (error instanceof InvalidSearchFiltersError || error instanceof InvalidInputError) return ExitCodes.VALIDATION_ERROR;
  return ExitCodes.GENERAL_ERROR;
}
