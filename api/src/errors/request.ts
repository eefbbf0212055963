/**
 * Invalid Request Error
 *
 * Thrown by services when the caller's input cannot be processed.
 * Caught by the onError handler → 400 VALIDATION_ERROR.
 */

export class InvalidRequestError extends Error {
  readonly code = 'VALIDATION_ERROR' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}
