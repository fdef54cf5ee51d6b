/**
 * @switchyard/dispatch - Availability Filtering Selection
 * Skips endpoints that keep failing, based on recorded outcomes.
 */

import { NoEndpointsAvailableError } from "../errors.js";
import type { Endpoint, SelectionStrategy } from "../types.js";
import { RoundRobinStrategy } from "./round-robin.js";

/**
 * Read side of the statistics recorder used for filtering
 */
export interface EndpointHealthSource {
  endpointStats(
    serviceName: string,
    endpoint: Endpoint
  ): { readonly consecutiveFailures: number } | undefined;
}

export interface AvailabilityFilteringOptions {
  health: EndpointHealthSource;
  /** Consecutive failures after which an endpoint is skipped (default: 3) */
  failureThreshold?: number;
  /** Below this many available endpoints, all candidates are used (default: 1) */
  minAvailable?: number;
  /** Chooses among the remaining candidates (default: round-robin) */
  inner?: SelectionStrategy;
}

const DEFAULT_OPTIONS = {
  failureThreshold: 3,
  minAvailable: 1,
};

export class AvailabilityFilteringStrategy implements SelectionStrategy {
  readonly name = "availability-filtering";
  private readonly health: EndpointHealthSource;
  private readonly failureThreshold: number;
  private readonly minAvailable: number;
  private readonly inner: SelectionStrategy;

  constructor(options: AvailabilityFilteringOptions) {
    this.health = options.health;
    this.failureThreshold = options.failureThreshold ?? DEFAULT_OPTIONS.failureThreshold;
    this.minAvailable = Math.max(1, options.minAvailable ?? DEFAULT_OPTIONS.minAvailable);
    this.inner = options.inner ?? new RoundRobinStrategy();
  }

  choose(serviceName: string, endpoints: readonly Endpoint[]): Endpoint {
    if (endpoints.length === 0) {
      throw new NoEndpointsAvailableError(serviceName);
    }

    const available = endpoints.filter((endpoint) => this.isAvailable(serviceName, endpoint));
    const pool = available.length >= this.minAvailable ? available : endpoints;
    return this.inner.choose(serviceName, pool);
  }

  isAvailable(serviceName: string, endpoint: Endpoint): boolean {
    const stats = this.health.endpointStats(serviceName, endpoint);
    return (stats?.consecutiveFailures ?? 0) < this.failureThreshold;
  }
}
