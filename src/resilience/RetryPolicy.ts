import {
  ConfigurationError,
  HttpRequestError,
  RequestCancelledError,
  RpcError,
  RpcRequestError,
  TimeoutError,
  isRetryableError,
} from '../utils/errors.js';
import { abortPromise, createAttemptSignal, sleep } from '../utils/abort.js';
import type { RpcRequest, RpcResponse } from '../rpc/types.js';

/**
 * Retry configuration
 */
export interface RetryConfig {
  /**
   * Retries after the first attempt; `k` allows at most `k + 1` attempts
   * @default 3
   */
  retryCount: number;

  /**
   * Base backoff before the first retry (ms), doubled on every retry
   * @default 150
   */
  retryDelay: number;

  /**
   * Deadline for a single attempt (ms)
   * @default 10000
   */
  timeout: number;

  /**
   * Optional callback invoked before each backoff sleep
   */
  onRetry?: (attempt: number, error: unknown, delay: number, request: RpcRequest) => void;
}

export interface ExecuteOptions {
  /** Request being sent; used as the error body */
  request: RpcRequest;
  /** Sanitized endpoint URL for error messages */
  url: string;
  signal?: AbortSignal;
  /** Return responses carrying `error` instead of raising them */
  raw?: boolean;
}

/**
 * Retry statistics for a single operation
 */
export interface RetryStats {
  attempts: number;
  totalDelay: number;
  errors: unknown[];
}

/**
 * One attempt. Receives a signal that aborts on caller cancellation or
 * when the attempt deadline passes.
 */
export type AttemptFn = (signal: AbortSignal) => Promise<RpcResponse>;

export const DEFAULT_RETRY_COUNT = 3;
export const DEFAULT_RETRY_DELAY = 150;
export const DEFAULT_TIMEOUT = 10_000;

/**
 * Retry policy shared by every transport.
 * Formula: delay = retryDelay * 2 ^ attempt, unless the server sent Retry-After
 */
export class RetryPolicy {
  private config: RetryConfig;

  constructor(config: Partial<RetryConfig> = {}) {
    this.config = {
      retryCount: config.retryCount ?? DEFAULT_RETRY_COUNT,
      retryDelay: config.retryDelay ?? DEFAULT_RETRY_DELAY,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      onRetry: config.onRetry,
    };

    if (!Number.isInteger(this.config.retryCount) || this.config.retryCount < 0) {
      throw ConfigurationError.invalidValue('retryCount', 'a non-negative integer', this.config.retryCount);
    }
    if (this.config.retryDelay < 0) {
      throw ConfigurationError.invalidValue('retryDelay', 'a non-negative number', this.config.retryDelay);
    }
    if (this.config.timeout <= 0) {
      throw ConfigurationError.invalidValue('timeout', 'a positive number', this.config.timeout);
    }
  }

  /**
   * Executes a request with deadline and retry logic
   * @returns The first successful response (or, in raw mode, the first response)
   * @throws The last error once attempts are exhausted, a non-retryable error
   * immediately, or `RequestCancelledError` when the caller aborts
   */
  async execute(attemptFn: AttemptFn, options: ExecuteOptions): Promise<RpcResponse> {
    const [response] = await this.executeWithStats(attemptFn, options);
    return response;
  }

  async executeWithStats(attemptFn: AttemptFn, options: ExecuteOptions): Promise<[RpcResponse, RetryStats]> {
    const { request, url, signal, raw = false } = options;
    const stats: RetryStats = {
      attempts: 0,
      totalDelay: 0,
      errors: [],
    };

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw new RequestCancelledError(signal.reason);
      }

      stats.attempts++;
      let error: unknown;
      const attemptSignal = createAttemptSignal(signal, this.config.timeout);
      const aborted = abortPromise(attemptSignal.signal);

      try {
        // Racing the signal bounds attempt functions that ignore it
        const response = await Promise.race([attemptFn(attemptSignal.signal), aborted.promise]);
        if (response.error === undefined || raw) {
          return [response, stats];
        }
        error = new RpcRequestError(url, request, new RpcError(response.error));
      } catch (caught) {
        if (signal?.aborted) {
          throw new RequestCancelledError(signal.reason);
        }
        error = attemptSignal.timedOut ? new TimeoutError(url, this.config.timeout, request) : caught;
      } finally {
        attemptSignal.dispose();
        aborted.dispose();
      }

      stats.errors.push(error);

      if (signal?.aborted) {
        throw new RequestCancelledError(signal.reason);
      }
      if (!isRetryableError(error) || attempt >= this.config.retryCount) {
        throw error;
      }

      const delay = this.calculateDelay(attempt, error);
      stats.totalDelay += delay;

      if (this.config.onRetry) {
        this.config.onRetry(attempt + 1, error, delay, request);
      }

      await sleep(delay, signal);
    }
  }

  /**
   * Calculates delay for a specific attempt
   * @param attempt - Attempt number (0-indexed)
   * @param error - Failure of that attempt; an HTTP Retry-After overrides the backoff
   */
  calculateDelay(attempt: number, error?: unknown): number {
    if (error instanceof HttpRequestError && error.retryAfterMs !== undefined) {
      return error.retryAfterMs;
    }
    return this.config.retryDelay * Math.pow(2, attempt);
  }
}
