/**
 * Raised once the listings fetch has used up its retries.
 * `cause` is the error from the final attempt.
 */
export class FetchError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause: Error) {
    super(message, { cause });
    this.name = 'FetchError';
    this.attempts = attempts;
  }
}

/**
 * A listings page that arrived but is not usable (challenge page, error page,
 * truncated body). Retried like a transport failure.
 */
export class InvalidPageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPageError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
