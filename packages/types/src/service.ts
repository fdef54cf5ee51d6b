/**
 * @module
 * Schemas for externally supplied client configuration: per-service
 * properties, the client properties document, endpoints and client
 * registrations.
 *
 * @example
 * ```typescript
 * import { type, serviceProperties } from '@switchyard/types';
 *
 * const result = serviceProperties({ readTimeoutMs: 3000, retryPolicy: 'standard' });
 * if (result instanceof type.errors) {
 *   console.error(result.summary);
 * }
 * ```
 */

import { type } from "arktype";
import {
  dispatchErrorKind,
  loggerLevel,
  nonEmptyString,
  nonNegativeInt,
  port,
  positiveInt,
  stringMap,
} from "./common.js";

// ============================================================================
// Retry Policy
// ============================================================================

/** Inline retry policy */
export const retryPolicyProperties = type({
  maxAttempts: positiveInt,
  "backoff?": "'linear' | 'exponential'",
  "initialDelayMs?": nonNegativeInt,
  "maxDelayMs?": nonNegativeInt,
  "retryOn?": dispatchErrorKind.array(),
});

// ============================================================================
// Service Properties
// ============================================================================

/**
 * Properties recognised for one service (or globally). Components are
 * referenced by registered name; `retryPolicy` may also be given inline.
 */
export const serviceProperties = type({
  "connectTimeoutMs?": nonNegativeInt,
  "readTimeoutMs?": nonNegativeInt,
  "loggerLevel?": loggerLevel,
  "retryPolicy?": nonEmptyString.or(retryPolicyProperties),
  "errorDecoder?": nonEmptyString,
  "requestInterceptors?": nonEmptyString.array(),
  "decode404AsEmpty?": "boolean",
});

/**
 * Client properties document. `config[defaultConfig]` (default key
 * `"default"`) holds the global tier; every other key is a service name.
 */
export const clientProperties = type({
  "defaultToProperties?": "boolean",
  "defaultConfig?": nonEmptyString,
  "config?": { "[string]": serviceProperties },
});

// ============================================================================
// Endpoints & Registrations
// ============================================================================

/** One concrete instance of a service */
export const endpoint = type({
  host: nonEmptyString,
  port,
  secure: "boolean",
  "metadata?": stringMap,
});

/** Client registration attributes */
export const clientRegistration = type({
  name: nonEmptyString,
  "url?": "string",
  "path?": "string",
  "decode404?": "boolean",
});

// ============================================================================
// Type Exports
// ============================================================================

export type RetryPolicyProperties = typeof retryPolicyProperties.infer;

export type ServiceProperties = typeof serviceProperties.infer;

export type ClientProperties = typeof clientProperties.infer;

/** Endpoint as accepted from a registry source; `metadata` defaults to `{}` */
export type EndpointInput = typeof endpoint.infer;

export type ClientRegistrationInput = typeof clientRegistration.infer;
