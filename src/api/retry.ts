/**
 * Retry logic with exponential backoff for parameter group operations
 *
 * Features:
 * - Total time budget rather than a fixed attempt count
 * - Exponential backoff with jitter between attempts
 * - Caller-supplied classification of retryable errors
 * - One final attempt once the budget is reached
 */

import type { RetryConfig, RetryResult } from './types.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  timeoutMs: 30_000,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  jitterFactor: 0.1,
};

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions extends RetryConfig {
  /** Decides whether a failed attempt may be retried */
  isRetryable: (error: Error) => boolean;
  /** Label used in log lines */
  operation?: string;
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Called when the time budget runs out */
  onExhausted?: (error: Error, attempts: number) => void;
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The attempt that just failed (1-indexed)
 * @returns Delay in milliseconds
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>
): number {
  // Exponential backoff: baseDelay * 2^(attempt-1)
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);

  // Add jitter to prevent thundering herd
  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  const delayWithJitter = exponentialDelay + jitter;

  // Clamp to max delay
  return Math.min(Math.max(delayWithJitter, 0), config.maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Execute a function until it succeeds, fails with a non-retryable error,
 * or the time budget runs out
 *
 * Never throws; the outcome is reported in the returned RetryResult.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    timeoutMs: options.timeoutMs ?? DEFAULT_RETRY_CONFIG.timeoutMs,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
  };

  const log = options.logger ?? logger;
  const operation = options.operation ?? 'operation';
  const startTime = Date.now();

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await fn();

      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`${operation} succeeded after ${attempt} attempts`, {
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
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      const elapsedMs = Date.now() - startTime;

      if (!options.isRetryable(error)) {
        log.debug(`${operation} failed with a non-retryable error`, {
          error: error.message,
          attempts: attempt,
        });
        return {
          success: false,
          error,
          attempts: attempt,
          totalTimeMs: elapsedMs,
        };
      }

      const remainingMs = config.timeoutMs - elapsedMs;
      if (remainingMs <= 0) {
        log.warn(`${operation} still failing after ${config.timeoutMs}ms`, {
          error: error.message,
          attempts: attempt,
          totalTimeMs: elapsedMs,
        });
        options.onExhausted?.(error, attempt);
        return {
          success: false,
          error,
          attempts: attempt,
          totalTimeMs: elapsedMs,
          timedOut: true,
        };
      }

      // The last sleep lands exactly on the deadline, which buys one final attempt
      const delayMs = Math.min(calculateDelay(attempt, config), remainingMs);

      log.info(`Retrying ${operation} in ${Math.round(delayMs)}ms`, {
        attempt,
        error: error.message,
        delayMs: Math.round(delayMs),
      });

      options.onRetry?.(attempt, error, delayMs);

      await sleep(delayMs);
    }
  }
}
