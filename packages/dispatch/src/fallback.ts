/**
 * @switchyard/dispatch - Fallback
 * Decorator mapping dispatch failures to fallback responses.
 */

import type { Logger } from "@switchyard/core";
import { DispatchError } from "./errors.js";
import type {
  DispatchErrorKind,
  DispatchHandler,
  DispatchOptions,
  DispatchResponse,
  LogicalRequest,
} from "./types.js";

export interface FallbackContext {
  serviceName: string;
  request: LogicalRequest;
  error: DispatchError;
}

export type FallbackFn = (context: FallbackContext) => DispatchResponse | Promise<DispatchResponse>;

export interface FallbackOptions {
  /** Failure kinds that fall back (default: every kind except `canceled`) */
  kinds?: readonly DispatchErrorKind[];
  logger?: Logger;
}

const DEFAULT_FALLBACK_KINDS: readonly DispatchErrorKind[] = [
  "no-instances",
  "malformed-target",
  "io-failure",
  "unexpected",
];

/**
 * Wrap a dispatch handler so that matching failures resolve to the
 * fallback's response. Other failures, and errors thrown by the fallback
 * itself, reach the caller.
 *
 * @example
 * ```typescript
 * const orders = withFallback(dispatcher, () => cachedOrdersResponse, { kinds: ['io-failure'] });
 * await orders.dispatch('orders', request);
 * ```
 */
export function withFallback(
  handler: DispatchHandler,
  fallback: FallbackFn,
  options: FallbackOptions = {}
): DispatchHandler {
  const kinds = options.kinds ?? DEFAULT_FALLBACK_KINDS;

  return {
    async dispatch(
      serviceName: string,
      request: LogicalRequest,
      dispatchOptions?: DispatchOptions
    ): Promise<DispatchResponse> {
      try {
        return await handler.dispatch(serviceName, request, dispatchOptions);
      } catch (error) {
        if (!(error instanceof DispatchError) || !kinds.includes(error.kind)) {
          throw error;
        }
        options.logger?.info("Using fallback response", {
          service: serviceName,
          kind: error.kind,
          reason: error.message,
        });
        return fallback({ serviceName, request, error });
      }
    },
  };
}
