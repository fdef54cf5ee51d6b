/**
 * @switchyard/dispatch - Timeout
 * Deadline wrapper for async operations
 */

// ============================================================================
// TIMEOUT
// ============================================================================

/**
 * Wrap a function with a deadline. When `timeoutMs` passes first, the
 * wrapper rejects with the error `onTimeout` builds; the wrapped promise is
 * left to settle on its own.
 *
 * @example
 * ```typescript
 * const run = withTimeout(
 *   () => fetch(url, { signal }),
 *   2000,
 *   () => new IoFailureError(`GET ${url} timed out after 2000ms`, { networkCode: 'ETIMEDOUT' })
 * );
 * ```
 */
export function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): () => Promise<T> {
  return async (): Promise<T> => {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(onTimeout()), timeoutMs);
    });

    try {
      return await Promise.race([fn(), timeoutPromise]);
    } finally {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
      }
    }
  };
}
