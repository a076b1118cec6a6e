/**
 * Retry logic with exponential backoff for the directory client
 *
 * Two budgets share one loop:
 * - transient failures (429, 5xx, network) up to `maxRetries`
 * - consistency failures (flagged by the per-call policy) up to `consistencyRetries`
 *
 * An aborted signal stops the loop before the next attempt or while waiting.
 */

import type { RetryConfig, RetryResult } from './types.js';
import { ApiRequestError, CancelledError, TransportError } from './errors.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  consistencyRetries: 8,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions extends RetryConfig {
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Caller cancellation */
  signal?: AbortSignal;
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The retry number within its budget (1-indexed)
 * @param retryAfter - Optional Retry-After header value (seconds)
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>,
  retryAfter?: number
): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    const jitter = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, config.maxDelayMs);
  }

  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);

  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  return Math.min(Math.max(exponentialDelay + jitter, 0), config.maxDelayMs);
}

/**
 * Sleep for a specified duration. Rejects with CancelledError if the signal
 * aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Operation cancelled while waiting to retry', signal.reason));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('Operation cancelled while waiting to retry', signal?.reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Check if an error is retryable based on configuration
 */
export function isRetryableError(error: Error, config: Required<RetryConfig>): boolean {
  if (error instanceof CancelledError) {
    return false;
  }

  if (error instanceof ApiRequestError) {
    return error.consistencyFailure || config.retryableStatuses.includes(error.status);
  }

  // Network failures and timeouts
  if (error instanceof TransportError) {
    return true;
  }

  return false;
}

/**
 * Parse Retry-After header value
 *
 * @param value - Header value (seconds as number or HTTP-date)
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  const seconds = parseInt(value, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds;
  }

  const date = new Date(value);
  const delayMs = date.getTime() - Date.now();
  if (!isNaN(delayMs) && delayMs > 0) {
    return Math.ceil(delayMs / 1000);
  }

  return undefined;
}

/**
 * Execute a function with retry logic
 *
 * @returns RetryResult with success/failure and metadata
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    consistencyRetries: options.consistencyRetries ?? DEFAULT_RETRY_CONFIG.consistencyRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: options.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };

  const log = options.logger ?? logger;
  const signal = options.signal;
  const startTime = Date.now();
  let transientRetries = 0;
  let consistencyRetries = 0;

  const fail = (error: Error, attempts: number): RetryResult<T> => ({
    success: false,
    error,
    attempts,
    totalTimeMs: Date.now() - startTime,
  });

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      return fail(new CancelledError('Operation cancelled', signal.reason), attempt - 1);
    }

    let lastError: Error;
    try {
      const result = await fn();
      const totalTimeMs = Date.now() - startTime;

      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, {
          attempts: attempt,
          totalTimeMs,
        });
      }

      return { success: true, data: result, attempts: attempt, totalTimeMs };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
    }

    if (!isRetryableError(lastError, config)) {
      log.debug('Error is not retryable', {
        error: lastError.message,
        attempts: attempt,
      });
      return fail(lastError, attempt);
    }

    const isConsistency = lastError instanceof ApiRequestError && lastError.consistencyFailure;
    const used = isConsistency ? consistencyRetries : transientRetries;
    const budget = isConsistency ? config.consistencyRetries : config.maxRetries;

    if (used >= budget) {
      if (budget > 0) {
        log.warn(`All ${budget} retry attempts exhausted`, {
          error: lastError.message,
          attempts: attempt,
          consistency: isConsistency,
          totalTimeMs: Date.now() - startTime,
        });
      }
      return fail(lastError, attempt);
    }

    if (isConsistency) {
      consistencyRetries++;
    } else {
      transientRetries++;
    }

    const retryAfter = lastError instanceof ApiRequestError ? lastError.retryAfter : undefined;
    const delayMs = calculateDelay(used + 1, config, retryAfter);

    log.info(`Retry attempt ${used + 1}/${budget} in ${Math.round(delayMs)}ms`, {
      error: lastError.message,
      status: lastError instanceof ApiRequestError ? lastError.status : undefined,
      consistency: isConsistency,
      delayMs: Math.round(delayMs),
    });

    try {
      await sleep(delayMs, signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        return fail(error, attempt);
      }
      throw error;
    }
  }
}
