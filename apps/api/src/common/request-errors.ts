/**
 * A request that could not be interpreted: malformed JSON, non-numeric query values.
 */
export class BadRequestError extends Error {
  constructor(
    message: string,
    public readonly title = 'Invalid request'
  ) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/** Request matched no route. */
export class RouteNotFoundError extends Error {
  constructor(method: string, path: string) {
    super(`Route ${method} ${path} not found`);
    this.name = 'RouteNotFoundError';
  }
}

/**
 * body-parser signals malformed JSON with a SyntaxError carrying status 400
 */
export function isBodyParseError(error: unknown): error is SyntaxError & { status: number } {
  return error instanceof SyntaxError && 'status' in error && error.status === 400;
}
