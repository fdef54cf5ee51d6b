/**
 * @switchyard/dispatch - Static Endpoint Registry
 * In-memory endpoint lists, replaced wholesale.
 */

import { ConfigurationError, type Logger } from "@switchyard/core";
import { describeProblems, endpoint as endpointSchema, type, type EndpointInput } from "@switchyard/types";
import type { Endpoint, EndpointRegistry } from "./types.js";

const NO_ENDPOINTS: readonly Endpoint[] = Object.freeze([]);

/**
 * Freeze an endpoint; `metadata` defaults to `{}`.
 */
export function toEndpoint(input: EndpointInput): Endpoint {
  return Object.freeze({
    host: input.host,
    port: input.port,
    secure: input.secure,
    metadata: Object.freeze({ ...input.metadata }),
  });
}

/**
 * Validate a list of untrusted endpoint descriptions.
 *
 * @throws ConfigurationError listing every invalid entry
 */
export function parseEndpoints(serviceName: string, inputs: readonly unknown[]): readonly Endpoint[] {
  const endpoints: Endpoint[] = [];
  const problems: string[] = [];

  inputs.forEach((input, index) => {
    const result = endpointSchema(input);
    if (result instanceof type.errors) {
      problems.push(...describeProblems(result).map((p) => `[${index}] ${p}`));
    } else {
      endpoints.push(toEndpoint(result));
    }
  });

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid endpoints for ${serviceName}`, problems, { serviceName });
  }
  return Object.freeze(endpoints);
}

/**
 * Endpoint registry backed by a map of frozen lists. `setEndpoints` swaps the
 * list by reference, so a dispatch that already read a list keeps using it.
 *
 * @example
 * ```typescript
 * const registry = new StaticEndpointRegistry({
 *   orders: [{ host: '10.0.0.5', port: 8080, secure: false }],
 * });
 * registry.setEndpoints('orders', [{ host: '10.0.0.6', port: 8080, secure: false }]);
 * ```
 */
export class StaticEndpointRegistry implements EndpointRegistry {
  private readonly lists = new Map<string, readonly Endpoint[]>();
  private readonly logger: Logger | undefined;

  constructor(initial: Record<string, readonly unknown[]> = {}, logger?: Logger) {
    this.logger = logger;
    for (const [serviceName, inputs] of Object.entries(initial)) {
      this.setEndpoints(serviceName, inputs);
    }
  }

  listEndpoints(serviceName: string): readonly Endpoint[] {
    return this.lists.get(serviceName) ?? NO_ENDPOINTS;
  }

  /**
   * Replace the endpoint list of a service. Nothing changes when any entry
   * is invalid.
   */
  setEndpoints(serviceName: string, inputs: readonly unknown[]): readonly Endpoint[] {
    const endpoints = parseEndpoints(serviceName, inputs);
    this.lists.set(serviceName, endpoints);
    this.logger?.debug("Endpoints replaced", { service: serviceName, count: endpoints.length });
    return endpoints;
  }

  removeService(serviceName: string): boolean {
    return this.lists.delete(serviceName);
  }

  serviceNames(): string[] {
    return [...this.lists.keys()];
  }
}
