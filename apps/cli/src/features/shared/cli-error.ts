/**
 * A command-line option value could not be interpreted.
 */
export class InvalidOptionError extends Error {
  constructor(
    message: string,
    public readonly option: string
  ) {
    super(message);
    this.name = 'InvalidOptionError';
  }
}

/**
 * Command input was well-formed but failed validation (e.g. a fraud prediction body).
 */
export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly issues: { message: string; path: string }[] = []
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Tips shown after error messages, keyed by error code.
 */
export const ERROR_TIPS: Partial<Record<string, string>> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'The requested transaction was not found. Double-check the ID and try again.',
  VALIDATION_ERROR: 'Amounts must be plain numbers, optionally prefixed with "$".',
};
