/**
 * Bounded retry with exponential backoff
 *
 * Features:
 * - Exponential backoff parameterized by initial delay, factor and jitter
 * - Attempt and elapsed-time ceilings
 * - Honors a backend-suggested retry delay, clamped to a maximum
 * - Pluggable retry predicate, so the wrapper knows nothing about the
 *   operation it retries
 */

import { BackendRequestError, toError } from './errors.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Backoff schedule
 */
export interface RetrySchedule {
  /** Delay before the second attempt */
  initialDelayMs: number;
  /** Multiplier applied to the delay after every attempt */
  factor: number;
  /** Random extra delay as a fraction of the current delay (0 disables) */
  jitter: number;
  /** Upper bound on any single delay, including a backend-suggested one */
  maxDelayMs: number;
  /** Total number of attempts, including the first */
  maxAttempts: number;
  /** No retry is scheduled past this much elapsed time */
  maxElapsedMs: number;
}

/**
 * Default schedule, matching the Kubernetes client's default backoff:
 * 10ms, 50ms, 250ms between four attempts
 */
export const DEFAULT_RETRY_SCHEDULE: RetrySchedule = {
  initialDelayMs: 10,
  factor: 5,
  jitter: 0.1,
  maxDelayMs: 5000,
  maxAttempts: 4,
  maxElapsedMs: 30000,
};

/**
 * HTTP statuses that mark a transient backend failure
 */
export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([429, 500, 504]);

/**
 * Status reasons that mark a transient backend failure
 */
export const TRANSIENT_REASONS: ReadonlySet<string> = new Set(['TooManyRequests', 'InternalError', 'Timeout']);

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions {
  /** Decides whether a failed attempt may be retried */
  isRetryable: (error: Error) => boolean;
  /** Overrides for the default schedule */
  schedule?: Partial<RetrySchedule>;
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Outcome of a retried operation
 */
export type RetryResult<T> =
  | {
      success: true;
      data: T;
      attempts: number;
      totalTimeMs: number;
    }
  | {
      success: false;
      /** Last observed error */
      error: Error;
      /** Whether the last error was retryable (the schedule ran out) */
      exhausted: boolean;
      attempts: number;
      totalTimeMs: number;
    };

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate the delay after a failed attempt
 *
 * @param attempt - The attempt that just failed (1-indexed)
 * @param schedule - Backoff schedule
 * @param retryAfter - Backend-suggested delay in seconds, if any
 * @param random - Source of jitter, in [0, 1)
 * @returns Delay in milliseconds
 */
export function calculateDelay(
  attempt: number,
  schedule: RetrySchedule,
  retryAfter?: number,
  random: () => number = Math.random
): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    return Math.min(retryAfter * 1000, schedule.maxDelayMs);
  }

  const base = schedule.initialDelayMs * Math.pow(schedule.factor, attempt - 1);
  const jitter = schedule.jitter > 0 ? random() * base * schedule.jitter : 0;
  return Math.min(base + jitter, schedule.maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Error Classification
// =============================================================================

/**
 * Collect transport error codes from an error and its cause chain
 */
function errorCodes(error: unknown, depth = 0): string[] {
  if (depth > 5 || typeof error !== 'object' || error === null) {
    return [];
  }

  const codes: string[] = [];
  if (error instanceof BackendRequestError && error.errno) {
    codes.push(error.errno);
  }
  if ('code' in error && typeof error.code === 'string') {
    codes.push(error.code);
  }
  if ('cause' in error) {
    codes.push(...errorCodes(error.cause, depth + 1));
  }
  return codes;
}

/**
 * Check if an error came from a reset connection
 */
export function isConnectionReset(error: Error): boolean {
  if (errorCodes(error).includes('ECONNRESET')) {
    return true;
  }
  return /connection reset by peer/i.test(error.message);
}

/**
 * Check if a backend error explicitly suggests a retry delay
 */
export function suggestsRetryDelay(error: Error): boolean {
  return error instanceof BackendRequestError && error.retryAfter !== undefined;
}

/**
 * Classify a backend error as transient (retry) or terminal (propagate)
 *
 * Transient: connection reset, internal server error, server timeout, rate
 * limiting, or an explicit retry-delay suggestion. Everything else,
 * including not-found, is terminal.
 */
export function isTransientBackendError(error: Error): boolean {
  if (isConnectionReset(error)) {
    return true;
  }

  if (!(error instanceof BackendRequestError)) {
    return false;
  }

  if (suggestsRetryDelay(error)) {
    return true;
  }

  if (TRANSIENT_STATUSES.has(error.status)) {
    return true;
  }

  return error.reason !== undefined && TRANSIENT_REASONS.has(error.reason);
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Execute a function with bounded retry
 *
 * Attempts run sequentially; the caller is blocked while waiting between
 * attempts. A non-retryable error ends the loop at once.
 *
 * @param fn - The operation to execute
 * @param options - Retry predicate and schedule
 * @returns RetryResult carrying the data or the last observed error
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const schedule: RetrySchedule = {
    ...DEFAULT_RETRY_SCHEDULE,
    ...options.schedule,
  };
  const maxAttempts = Math.max(1, schedule.maxAttempts);

  const log = options.logger ?? logger;
  const startTime = Date.now();

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await fn();

      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.debug(`Request succeeded after ${attempt} attempts`, {
          attempts: attempt,
          totalTimeMs,
        });
      }

      return {
        success: true,
        data: result,
        attempts: attempt,
        totalTimeMs,
      };
    } catch (thrown) {
      const lastError = toError(thrown);
      const retryable = options.isRetryable(lastError);

      if (!retryable) {
        log.debug('Error is not retryable', {
          error: lastError.message,
          attempts: attempt,
        });
        return {
          success: false,
          error: lastError,
          exhausted: false,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        };
      }

      const retryAfter =
        lastError instanceof BackendRequestError ? lastError.retryAfter : undefined;
      const delayMs = calculateDelay(attempt, schedule, retryAfter);
      const elapsed = Date.now() - startTime;

      if (attempt >= maxAttempts || elapsed + delayMs > schedule.maxElapsedMs) {
        log.warn(`Retry schedule exhausted after ${attempt} attempts`, {
          error: lastError.message,
          attempts: attempt,
          totalTimeMs: elapsed,
        });
        return {
          success: false,
          error: lastError,
          exhausted: true,
          attempts: attempt,
          totalTimeMs: elapsed,
        };
      }

      log.debug(`Retry attempt ${attempt}/${maxAttempts - 1} in ${Math.round(delayMs)}ms`, {
        error: lastError.message,
        status: lastError instanceof BackendRequestError ? lastError.status : undefined,
        delayMs: Math.round(delayMs),
      });

      options.onRetry?.(attempt, lastError, delayMs);

      await sleep(delayMs);
    }
  }
}
