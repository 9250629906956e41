/**
 * Errors raised by the RateLimitedClient
 */

import { CollectorError } from '../../utils/errors';

/**
 * Network failure, timeout, or an unreadable body. Retryable.
 */
export class TransportError extends CollectorError {
  readonly kind = 'TRANSPORT' as const;

  constructor(message: string, public readonly providerId: string, originalError?: unknown) {
    super(message, originalError);
  }
}

/**
 * HTTP 429 from the provider. Retryable after backoff.
 */
export class RateLimitExceededError extends CollectorError {
  readonly kind = 'RATE_LIMITED' as const;

  constructor(public readonly providerId: string, public readonly retryAfterMs?: number) {
    super(
      retryAfterMs !== undefined
        ? `${providerId} rate limit exceeded, retry after ${retryAfterMs}ms`
        : `${providerId} rate limit exceeded`
    );
  }
}

/**
 * Any other non-2xx response. 4xx is permanent, 5xx is retried.
 */
export class UpstreamError extends CollectorError {
  readonly kind = 'UPSTREAM' as const;

  constructor(
    message: string,
    public readonly providerId: string,
    public readonly statusCode: number,
    public readonly body?: unknown
  ) {
    super(message);
  }

  get permanent(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }
}

/**
 * The retry budget ran out. Raised once per fetch.
 */
export class FetchFailedError extends CollectorError {
  readonly kind = 'FETCH_FAILED' as const;

  constructor(
    public readonly providerId: string,
    public readonly attempts: number,
    public readonly lastError: CollectorError
  ) {
    super(`${providerId} fetch failed after ${attempts} attempts: ${lastError.message}`, lastError);
  }
}

/**
 * The caller abandoned the fetch (shutdown).
 */
export class FetchAbortedError extends CollectorError {
  readonly kind = 'ABORTED' as const;

  constructor(message = 'Fetch aborted') {
    super(message);
  }
}

export type RetryableError = TransportError | RateLimitExceededError | UpstreamError;

export function isRetryable(error: CollectorError): error is RetryableError {
  if (error instanceof UpstreamError) {
    return !error.permanent;
  }
  return error instanceof TransportError || error instanceof RateLimitExceededError;
}
