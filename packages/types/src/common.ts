/**
 * @module
 * Primitive schemas shared by the Switchyard schemas, and the
 * error-kind vocabulary used across packages.
 *
 * @example
 * ```typescript
 * import { port, dispatchErrorKind } from '@switchyard/types';
 *
 * const result = port(8080);
 * ```
 */

import { type } from "arktype";

// ============================================================================
// Primitive Schemas
// ============================================================================

/** Non-empty string */
export const nonEmptyString = type("string >= 1");

/** Positive integer */
export const positiveInt = type("number.integer > 0");

/** Non-negative integer */
export const nonNegativeInt = type("number.integer >= 0");

/** TCP port */
export const port = type("1 <= number.integer <= 65535");

/** Flat string-to-string map, used for endpoint metadata */
export const stringMap = type({ "[string]": "string" });

// ============================================================================
// Dispatch Vocabulary
// ============================================================================

/** Classified failure kinds reported by the dispatcher */
export const dispatchErrorKind = type(
  "'no-instances' | 'malformed-target' | 'io-failure' | 'unexpected' | 'canceled'"
);

/** Verbosity of per-call request logging */
export const loggerLevel = type("'NONE' | 'BASIC' | 'HEADERS' | 'FULL'");

// ============================================================================
// Type Exports
// ============================================================================

export type NonEmptyString = typeof nonEmptyString.infer;

export type PositiveInt = typeof positiveInt.infer;

export type NonNegativeInt = typeof nonNegativeInt.infer;

export type Port = typeof port.infer;

export type StringMap = typeof stringMap.infer;

/**
 * Failure kind: `no-instances`, `malformed-target`, `io-failure`,
 * `unexpected` or `canceled`.
 */
export type DispatchErrorKind = typeof dispatchErrorKind.infer;

/**
 * Request logging verbosity. `NONE` logs nothing, `BASIC` logs method, URL,
 * status and latency, `HEADERS` adds headers and `FULL` adds body size.
 */
export type LoggerLevel = typeof loggerLevel.infer;
