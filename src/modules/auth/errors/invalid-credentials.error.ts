export type InvalidCredentialsReason = 'malformed' | 'signature' | 'algorithm' | 'expired';

/**
 * Raised by {@link TokenService.verify} for any token that cannot be trusted.
 * `reason` is for logs only; callers must answer every reason the same way.
 */
export class InvalidCredentialsError extends Error {
  constructor(
    readonly reason: InvalidCredentialsReason,
    options?: { cause?: unknown },
  ) {
    super(`Invalid credentials (${reason})`, options);
    this.name = 'InvalidCredentialsError';
  }
}
