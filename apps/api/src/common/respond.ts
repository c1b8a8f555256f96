import type { NextFunction, Response } from 'express';
import type { Result } from 'neverthrow';

/**
 * Send the presented value as JSON, or hand the error to the error middleware.
 */
export function sendResult<T, U>(
  response: Response,
  next: NextFunction,
  result: Result<T, Error>,
  present: (value: T) => U
): void {
  result.match(
    (value) => {
      response.json(present(value));
    },
    (error) => next(error)
  );
}
