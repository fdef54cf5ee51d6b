/**
 * @switchyard/dispatch - Retry
 * Repeat failed attempts with backoff
 */

import { DispatchError } from "../errors.js";
import type { RetryPolicy } from "../types.js";

// ============================================================================
// RETRY
// ============================================================================

/**
 * Options for configuring retry behavior.
 */
export interface RetryOptions {
  /** Number of retry attempts (not including initial attempt) */
  attempts: number;
  /** Backoff strategy */
  backoff: "linear" | "exponential";
  /** Initial delay in ms */
  initialDelay: number;
  /** Maximum delay in ms */
  maxDelay: number;
  /** Should retry predicate */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Callback on retry */
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  /** Aborting cuts a pending backoff short; the retry rejects with the abort reason */
  signal?: AbortSignal;
}

/**
 * Default retry predicate: I/O failures only
 */
const defaultShouldRetry = (error: unknown): boolean =>
  error instanceof DispatchError && error.kind === "io-failure";

/**
 * Calculate delay for retry attempt
 */
export function calculateDelay(attempt: number, options: RetryOptions): number {
  let delay: number;

  if (options.backoff === "exponential") {
    delay = options.initialDelay * Math.pow(2, attempt);
  } else {
    delay = options.initialDelay * (attempt + 1);
  }

  return Math.round(Math.min(delay, options.maxDelay));
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Wrap a function with retry logic. The wrapped function receives the
 * 1-based attempt number.
 *
 * @example
 * ```typescript
 * const call = withRetry(
 *   (attempt) => transport.execute(request, options),
 *   { attempts: 2, backoff: 'exponential', initialDelay: 100, maxDelay: 5000 }
 * );
 * const response = await call();
 * ```
 */
export function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): () => Promise<T> {
  const shouldRetry = options.shouldRetry ?? defaultShouldRetry;

  return async (): Promise<T> => {
    let lastError: unknown;

    for (let attempt = 0; attempt <= options.attempts; attempt++) {
      try {
        return await fn(attempt + 1);
      } catch (error) {
        lastError = error;

        if (attempt >= options.attempts || !shouldRetry(error, attempt)) {
          throw error;
        }

        const delay = calculateDelay(attempt, options);
        options.onRetry?.(error, attempt + 1, delay);
        await sleep(delay, options.signal);
      }
    }

    throw lastError;
  };
}

// ============================================================================
// RETRY POLICY
// ============================================================================

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxAttempts: 3,
  backoff: "exponential",
  initialDelayMs: 100,
  maxDelayMs: 5000,
  retryOn: Object.freeze(["io-failure" as const]),
});

/**
 * Complete a partial policy with the defaults and freeze it.
 */
export function createRetryPolicy(policy: Partial<RetryPolicy> = {}): RetryPolicy {
  return Object.freeze({
    maxAttempts: Math.max(1, policy.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts),
    backoff: policy.backoff ?? DEFAULT_RETRY_POLICY.backoff,
    initialDelayMs: policy.initialDelayMs ?? DEFAULT_RETRY_POLICY.initialDelayMs,
    maxDelayMs: policy.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    retryOn: Object.freeze([...(policy.retryOn ?? DEFAULT_RETRY_POLICY.retryOn)]),
  });
}

/**
 * Translate a service's retry policy into retry options. Only dispatch
 * errors whose kind the policy lists are retried.
 */
export function retryOptionsFromPolicy(
  policy: RetryPolicy,
  hooks: Pick<RetryOptions, "onRetry" | "signal"> = {}
): RetryOptions {
  return {
    ...hooks,
    attempts: Math.max(0, policy.maxAttempts - 1),
    backoff: policy.backoff,
    initialDelay: policy.initialDelayMs,
    maxDelay: policy.maxDelayMs,
    shouldRetry: (error) => error instanceof DispatchError && policy.retryOn.includes(error.kind),
  };
}
