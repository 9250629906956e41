/**
 * Rate Limited Client for price provider APIs
 *
 * Provides HTTP GET requests with:
 * - Per-provider throttling through a shared token bucket
 * - Timeout handling
 * - Error categorization (transport, rate limit, upstream)
 * - Retry logic with exponential backoff and jitter
 *
 * Responses are never cached.
 */

import { HttpRequest, HttpResponse } from '../../types/price-provider';
import { TokenBucketRateLimiter } from '../../services/rate-limiter';
import { Clock, systemClock } from '../../utils/clock';
import { CollectorError, errorMessageOf, isRecord } from '../../utils/errors';
import { logCollectorEvent } from '../../utils/log';
import {
  FetchAbortedError,
  FetchFailedError,
  RateLimitExceededError,
  TransportError,
  UpstreamError,
  isRetryable,
} from './errors';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Fraction (0-1) of the delay added as random jitter */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  initialDelayMs: 1000,
  maxDelayMs: 60000,
  multiplier: 2,
  jitterFactor: 0.1,
};

export interface RateLimitedClientOptions {
  providerId: string;
  limiter: TokenBucketRateLimiter;
  /** Credential headers sent with every request */
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
  clock?: Clock;
  random?: () => number;
}

export class RateLimitedClient {
  readonly providerId: string;
  private readonly limiter: TokenBucketRateLimiter;
  private readonly defaultHeaders: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly retryConfig: RetryConfig;
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(options: RateLimitedClientOptions) {
    this.providerId = options.providerId;
    this.limiter = options.limiter;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;

    if (!Number.isInteger(this.retryConfig.maxAttempts) || this.retryConfig.maxAttempts < 1) {
      throw new Error('maxAttempts must be a positive integer');
    }
  }

  /**
   * Execute a request, retrying transient failures
   *
   * @throws UpstreamError immediately for a permanent (4xx) response
   * @throws FetchFailedError once the retry budget is spent
   * @throws FetchAbortedError when the signal fires
   */
  async fetch(request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse<unknown>> {
    let lastError: CollectorError | undefined;

    for (let attempt = 1; attempt <= this.retryConfig.maxAttempts; attempt++) {
      this.throwIfAborted(signal);
      await this.limiter.acquire(signal);
      // stop() may have fired while this call waited for its token
      this.throwIfAborted(signal);

      try {
        const response = await this.attempt(request, signal);
        return { ...response, attempts: attempt };
      } catch (error) {
        if (!(error instanceof CollectorError)) {
          throw error;
        }
        if (error instanceof FetchAbortedError) {
          throw error;
        }
        if (!isRetryable(error)) {
          throw error;
        }

        lastError = error;

        if (attempt < this.retryConfig.maxAttempts) {
          const delayMs = this.retryDelayFor(error, attempt);
          logCollectorEvent('WARN', 'RETRY_SCHEDULED', {
            providerId: this.providerId,
            path: request.path,
            attempt,
            delayMs,
            errorKind: error.kind,
            message: error.message,
          });
          await this.clock.sleep(delayMs, signal);
        }
      }
    }

    // maxAttempts >= 1, so a retryable error was recorded before getting here
    throw new FetchFailedError(
      this.providerId,
      this.retryConfig.maxAttempts,
      lastError ?? new TransportError('No attempt was made', this.providerId)
    );
  }

  /**
   * Calculate retry delay using exponential backoff
   *
   * Formula: delay = initialDelayMs * (multiplier ^ (attempt - 1)), capped at
   * maxDelayMs, plus up to jitterFactor * delay of jitter
   *
   * @param attempt - The attempt that just failed (1-based)
   */
  calculateRetryDelay(attempt: number): number {
    const { initialDelayMs, multiplier, maxDelayMs, jitterFactor } = this.retryConfig;
    const baseDelay = initialDelayMs * Math.pow(multiplier, attempt - 1);
    const cappedDelay = Math.min(baseDelay, maxDelayMs);
    const jitter = cappedDelay * jitterFactor * this.random();
    return Math.floor(cappedDelay + jitter);
  }

  private retryDelayFor(error: CollectorError, attempt: number): number {
    const delay = this.calculateRetryDelay(attempt);
    // A server-provided Retry-After wins when it asks for more patience
    if (error instanceof RateLimitExceededError && error.retryAfterMs !== undefined) {
      return Math.max(delay, error.retryAfterMs);
    }
    return delay;
  }

  private async attempt(
    request: HttpRequest,
    signal?: AbortSignal
  ): Promise<Omit<HttpResponse<unknown>, 'attempts'>> {
    this.throwIfAborted(signal);
    const startTime = this.clock.now();
    const url = this.buildUrl(request.endpoint, request.path, request.params);
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: request.method,
          headers: {
            Accept: 'application/json',
            ...this.defaultHeaders,
            ...request.headers,
          },
          signal: controller.signal,
        });
      } catch (error) {
        if (signal?.aborted) {
          throw new FetchAbortedError();
        }
        if (controller.signal.aborted) {
          throw new TransportError(
            `Request to ${request.path} timed out after ${timeoutMs}ms`,
            this.providerId,
            error
          );
        }
        throw new TransportError(
          `Network error: ${errorMessageOf(error)}`,
          this.providerId,
          error
        );
      }

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      if (!response.ok) {
        const body = await this.safeParseJson(response);
        throw this.createErrorFromResponse(response.status, body, headers);
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (error) {
        if (signal?.aborted) {
          throw new FetchAbortedError();
        }
        throw new TransportError(
          `Unreadable response body from ${request.path}`,
          this.providerId,
          error
        );
      }

      return {
        data,
        status: response.status,
        headers,
        latencyMs: this.clock.now() - startTime,
      };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new FetchAbortedError();
    }
  }

  /**
   * Build full URL from endpoint, path, and query parameters
   */
  private buildUrl(endpoint: string, path: string, params?: Record<string, string>): string {
    const baseUrl = endpoint.replace(/\/$/, '');
    const normalizedPath = path.startsWith('/') ? path : `/${path}`;

    let url = `${baseUrl}${normalizedPath}`;

    if (params && Object.keys(params).length > 0) {
      url += `?${new URLSearchParams(params).toString()}`;
    }

    return url;
  }

  private async safeParseJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      return null;
    }
  }

  private createErrorFromResponse(
    status: number,
    body: unknown,
    headers: Record<string, string>
  ): CollectorError {
    if (status === 429) {
      return new RateLimitExceededError(this.providerId, parseRetryAfter(headers['retry-after']));
    }

    return new UpstreamError(
      extractErrorMessage(body, status),
      this.providerId,
      status,
      body
    );
  }
}

/**
 * Parse a Retry-After header value to milliseconds
 *
 * Supports numeric seconds ("120") and HTTP dates.
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }

  if (/^\s*\d+\s*$/.test(value)) {
    return parseInt(value, 10) * 1000;
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    return Math.max(0, date.getTime() - now);
  }

  return undefined;
}

/**
 * Extract an error message from a provider error body
 *
 * CoinGecko uses `error` or `status.error_message`, CoinMarketCap uses
 * `status.error_message`.
 */
function extractErrorMessage(body: unknown, status: number): string {
  if (isRecord(body)) {
    if (typeof body.error === 'string') {
      return body.error;
    }
    if (typeof body.message === 'string') {
      return body.message;
    }
    if (isRecord(body.status) && typeof body.status.error_message === 'string') {
      return body.status.error_message;
    }
  }

  return `HTTP ${status} error`;
}
