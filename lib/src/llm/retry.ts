/**
 * Retry Utilities for LLM Adapters
 *
 * Exponential backoff with jitter for transient provider failures
 * (timeouts, server errors, dropped connections).
 */

import {
  DEFAULT_RETRY_CONFIG,
  type LLMErrorInfo,
  type LLMProvider,
  type RetryConfig,
  type RetryEvent,
  type RetryEventHandler,
} from './types.js';
import { isLLMError, LLMError } from './errors.js';

// ============================================================================
// Retry Utilities
// ============================================================================

/**
 * Calculates the delay before the next retry attempt.
 *
 * @param attemptNumber - The attempt that just failed (1-based)
 * @param errorRetryAfterMs - Retry-after hint carried by the error, capped at maxDelayMs
 */
export function calculateRetryDelay(
  attemptNumber: number,
  config: Required<RetryConfig>,
  errorRetryAfterMs?: number,
  random: () => number = Math.random
): number {
  if (errorRetryAfterMs !== undefined && errorRetryAfterMs > 0) {
    return Math.min(errorRetryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay =
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attemptNumber - 1);
  let delay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor;
    delay = Math.max(0, delay + (random() - 0.5) * jitterRange);
  }

  return Math.round(delay);
}

export function shouldRetry(error: unknown, config: Required<RetryConfig>): boolean {
  if (!isLLMError(error) || !error.retryable) {
    return false;
  }

  const codes: readonly string[] = config.retryableErrorCodes;
  return codes.length === 0 || codes.includes(error.code);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function mergeRetryConfig(config?: Partial<RetryConfig>): Required<RetryConfig> {
  return {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };
}

function createRetryEvent(
  type: RetryEvent['type'],
  attemptNumber: number,
  maxRetries: number,
  error?: LLMErrorInfo,
  nextDelayMs?: number
): RetryEvent {
  return {
    type,
    attemptNumber,
    maxRetries,
    error,
    nextDelayMs,
    timestamp: new Date(),
  };
}

// ============================================================================
// withRetry Function
// ============================================================================

export interface WithRetryOptions {
  /** Provider named on errors that were not already LLMErrors */
  provider: LLMProvider;
  config?: Partial<RetryConfig> | undefined;
  onRetryEvent?: RetryEventHandler | undefined;
  /** Replaceable in tests so backoff does not wait on the real clock */
  sleepFn?: ((ms: number) => Promise<void>) | undefined;
}

/**
 * Runs `fn`, retrying errors allowed by the retry config.
 *
 * @throws {LLMError} The last error once retries are spent, or the first
 * error that is not retryable
 *
 * @example
 * ```typescript
 * const response = await withRetry(() => model.generateContent(prompt), {
 *   provider: 'gemini',
 *   config: { maxRetries: 2 },
 * });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: WithRetryOptions
): Promise<T> {
  const config = mergeRetryConfig(options.config);
  const { onRetryEvent, provider } = options;
  const wait = options.sleepFn ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const llmError = LLMError.fromError(error, provider);
      onRetryEvent?.(
        createRetryEvent('attempt_failed', attempt, config.maxRetries, llmError.info)
      );

      const isLastAttempt = attempt > config.maxRetries;
      if (isLastAttempt || !shouldRetry(llmError, config)) {
        if (isLastAttempt) {
          onRetryEvent?.(
            createRetryEvent('max_retries_exceeded', attempt, config.maxRetries, llmError.info)
          );
        }
        throw llmError;
      }

      const delayMs = calculateRetryDelay(attempt, config, llmError.retryAfterMs);
      onRetryEvent?.(
        createRetryEvent('retrying', attempt, config.maxRetries, llmError.info, delayMs)
      );
      await wait(delayMs);
    }
  }
}
