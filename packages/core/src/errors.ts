/**
 * @module
 * Base error class for Switchyard packages.
 *
 * @example
 * ```typescript
 * import { SwitchyardError } from '@switchyard/core';
 *
 * throw new SwitchyardError('Registry unavailable', 'REGISTRY_UNAVAILABLE', 503);
 * ```
 */

/**
 * Every error raised by Switchyard carries a stable `code`, an HTTP-like
 * `statusCode` and optional structured `details`.
 */
export class SwitchyardError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "SwitchyardError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details ?? undefined;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    statusCode: number;
    details: Record<string, unknown> | undefined;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/**
 * Invalid or inconsistent configuration (HTTP 500).
 * Raised at registration or resolution time, never mid-call.
 */
export class ConfigurationError extends SwitchyardError {
  constructor(
    message: string,
    public readonly problems: string[] = [],
    details?: Record<string, unknown>
  ) {
    super(message, "CONFIGURATION_ERROR", 500, problems.length > 0 ? { ...details, problems } : details);
    this.name = "ConfigurationError";
  }
}

/**
 * Walk an error's `cause` chain, outermost first. Stops on cycles.
 */
export function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !seen.has(current)) {
    chain.push(current);
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}
