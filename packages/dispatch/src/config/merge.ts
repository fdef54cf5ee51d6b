/**
 * @switchyard/dispatch - Service Options Merge
 */

import type { RequestInterceptor, ServiceOptions, ServiceOptionsTier } from "../types.js";
import { DEFAULT_SERVICE_OPTIONS } from "./defaults.js";

/**
 * Merge three configuration tiers into frozen service options.
 *
 * With `defaultToProperties` (the default) the order, lowest first, is
 * code < global < per-service; otherwise global < per-service < code.
 * A field set in a tier replaces lower tiers. Interceptor lists append in
 * tier order; an empty list clears what came before.
 *
 * @example
 * ```typescript
 * resolveServiceOptions(
 *   { readTimeoutMs: 1000 },
 *   { readTimeoutMs: 2000, retryPolicy: standard },
 *   { readTimeoutMs: 3000 },
 *   true
 * );
 * // readTimeoutMs: 3000, retryPolicy: standard
 * ```
 */
export function resolveServiceOptions(
  codeDefaults: ServiceOptionsTier,
  globalProperties: ServiceOptionsTier,
  perServiceProperties: ServiceOptionsTier,
  defaultToProperties: boolean = true
): ServiceOptions {
  const tiers = defaultToProperties
    ? [codeDefaults, globalProperties, perServiceProperties]
    : [globalProperties, perServiceProperties, codeDefaults];

  let connectTimeoutMs = DEFAULT_SERVICE_OPTIONS.connectTimeoutMs;
  let readTimeoutMs = DEFAULT_SERVICE_OPTIONS.readTimeoutMs;
  let loggerLevel = DEFAULT_SERVICE_OPTIONS.loggerLevel;
  let retryPolicy = DEFAULT_SERVICE_OPTIONS.retryPolicy;
  let errorDecoder = DEFAULT_SERVICE_OPTIONS.errorDecoder;
  let decodeNotFoundAsEmpty = DEFAULT_SERVICE_OPTIONS.decodeNotFoundAsEmpty;
  let interceptors: RequestInterceptor[] = [...DEFAULT_SERVICE_OPTIONS.interceptors];

  for (const tier of tiers) {
    connectTimeoutMs = tier.connectTimeoutMs ?? connectTimeoutMs;
    readTimeoutMs = tier.readTimeoutMs ?? readTimeoutMs;
    loggerLevel = tier.loggerLevel ?? loggerLevel;
    retryPolicy = tier.retryPolicy ?? retryPolicy;
    errorDecoder = tier.errorDecoder ?? errorDecoder;
    decodeNotFoundAsEmpty = tier.decodeNotFoundAsEmpty ?? decodeNotFoundAsEmpty;

    if (tier.interceptors !== undefined) {
      interceptors = tier.interceptors.length === 0 ? [] : [...interceptors, ...tier.interceptors];
    }
  }

  return Object.freeze({
    connectTimeoutMs,
    readTimeoutMs,
    loggerLevel,
    retryPolicy,
    errorDecoder,
    interceptors: Object.freeze(interceptors),
    decodeNotFoundAsEmpty,
  });
}
