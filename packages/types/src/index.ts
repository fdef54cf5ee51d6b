/**
 * @module
 * Runtime-validated schemas and TypeScript types for Switchyard
 * configuration, built on ArkType.
 *
 * @example
 * ```typescript
 * import { describeProblems, serviceProperties, type } from '@switchyard/types';
 *
 * const result = serviceProperties(input);
 * if (result instanceof type.errors) {
 *   console.error(describeProblems(result));
 * }
 * ```
 */

import type { ArkErrors } from "arktype";

// Re-export ArkType for convenience
export { type } from "arktype";
export type { Type, ArkErrors } from "arktype";

// ============================================================================
// Common Schemas & Types
// ============================================================================
export * from "./common.js";

// ============================================================================
// Service Configuration Schemas & Types
// ============================================================================
export * from "./service.js";

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Anything callable like an ArkType schema: returns the validated value or
 * the collected errors.
 */
export type Schema<T> = (data: unknown) => T | ArkErrors;

/**
 * One `path: message` line per error; root errors carry the message alone.
 */
export function describeProblems(errors: ArkErrors): string[] {
  return errors.map((e) => {
    const path = e.path.map(String).join(".");
    return path ? `${path}: ${e.problem}` : e.problem;
  });
}
