/**
 * Retry logic with exponential backoff for the LXD client
 *
 * Only idempotent reads go through here. State changes, creation, updates
 * and deletes are sent once; a failed mutation aborts the reconciliation.
 */

import type { RetryConfig, RetryResult } from './types.js';
import { ApiError, TransportError, toError } from './errors.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 10000,
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
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Replaces the sleep between attempts (tests) */
  sleep?: (ms: number) => Promise<void>;
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The current attempt number (1-indexed)
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>
): number {
  // Exponential backoff: baseDelay * 2^(attempt-1)
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);

  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  return Math.min(Math.max(exponentialDelay + jitter, 0), config.maxDelayMs);
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
 * Check if an error is worth another attempt
 */
export function isRetryableError(
  error: Error,
  config: Required<RetryConfig>
): boolean {
  if (error instanceof ApiError) {
    return config.retryableStatuses.includes(error.status);
  }

  if (error instanceof TransportError) {
    const message = error.message.toLowerCase();
    return ['econnreset', 'etimedout', 'eai_again', 'socket hang up'].some(
      (pattern) => message.includes(pattern)
    );
  }

  return false;
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
    ...DEFAULT_RETRY_CONFIG,
    ...options,
  };

  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const startTime = Date.now();
  let lastError: Error = new Error('Unknown error');

  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    try {
      const result = await fn();

      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, {
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
    } catch (error) {
      lastError = toError(error);

      const isLastAttempt = attempt > config.maxRetries;

      if (!isRetryableError(lastError, config) || isLastAttempt) {
        if (isLastAttempt && config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, {
            error: lastError.message,
            attempts: attempt,
          });
        }

        return {
          success: false,
          error: lastError,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        };
      }

      const delayMs = calculateDelay(attempt, config);

      log.info(
        `Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`,
        {
          error: lastError.message,
          status: lastError instanceof ApiError ? lastError.status : undefined,
          delayMs: Math.round(delayMs),
        }
      );

      options.onRetry?.(attempt, lastError, delayMs);

      await wait(delayMs);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: config.maxRetries + 1,
    totalTimeMs: Date.now() - startTime,
  };
}
