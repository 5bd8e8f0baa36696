/**
 * Signing Error Types
 *
 * A signing failure happens before anything is sent, so {@link SigningError}
 * is a {@link ConstructionError} with code `SIGNING`; `reason` tells the
 * failures apart.
 */

import { ConstructionError } from '../error/index.js';

/**
 * Reasons a request could not be signed.
 */
export type SigningFailureReason =
  | 'MISSING_HEADER'
  | 'INVALID_URL'
  | 'INVALID_TIMESTAMP'
  | 'SIGNING_FAILED';

/**
 * Error thrown during request signing operations.
 *
 * @example
 * ```typescript
 * throw new SigningError('Missing required header: host', 'MISSING_HEADER');
 * ```
 */
export class SigningError extends ConstructionError {
  public readonly reason: SigningFailureReason;

  constructor(message: string, reason: SigningFailureReason, cause?: unknown) {
    super(message, 'SIGNING', cause);
    this.name = 'SigningError';
    this.reason = reason;
  }

  override toString(): string {
    return `${this.name} [${this.reason}]: ${this.message}`;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), reason: this.reason };
  }
}

/**
 * Type guard to check if an error is a SigningError.
 */
export function isSigningError(error: unknown): error is SigningError {
  return error instanceof SigningError;
}
