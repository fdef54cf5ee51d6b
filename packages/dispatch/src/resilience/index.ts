/**
 * @switchyard/dispatch - Resilience
 */

export {
  withRetry,
  calculateDelay,
  createRetryPolicy,
  retryOptionsFromPolicy,
  DEFAULT_RETRY_POLICY,
  type RetryOptions,
} from "./retry.js";
export { withTimeout } from "./timeout.js";
