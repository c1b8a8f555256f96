/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all, including unreadable data files) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Resource not found (transaction id) */
  NOT_FOUND: 4,

  /** Validation error (search filters, prediction input) */
  VALIDATION_ERROR: 8,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
