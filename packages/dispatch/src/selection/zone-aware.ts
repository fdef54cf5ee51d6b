/**
 * @switchyard/dispatch - Zone Aware Selection
 */

import { NoEndpointsAvailableError } from "../errors.js";
import type { Endpoint, SelectionStrategy } from "../types.js";
import { RoundRobinStrategy } from "./round-robin.js";

/** Metadata key holding an endpoint's zone */
export const ZONE_METADATA_KEY = "zone";

export interface ZoneAwareOptions {
  /** Zone of the calling process */
  zone: string;
  /** Chooses among the filtered candidates (default: round-robin) */
  inner?: SelectionStrategy;
}

/**
 * Prefers endpoints in the local zone and falls back to every candidate when
 * the zone has none. The inner strategy keeps separate state for the
 * in-zone list (`orders@eu-west-1a`) and the full list (`orders`).
 */
export class ZoneAwareStrategy implements SelectionStrategy {
  readonly name = "zone-aware";
  private readonly zone: string;
  private readonly inner: SelectionStrategy;

  constructor(options: ZoneAwareOptions) {
    this.zone = options.zone;
    this.inner = options.inner ?? new RoundRobinStrategy();
  }

  choose(serviceName: string, endpoints: readonly Endpoint[]): Endpoint {
    if (endpoints.length === 0) {
      throw new NoEndpointsAvailableError(serviceName);
    }

    const local = endpoints.filter((e) => e.metadata[ZONE_METADATA_KEY] === this.zone);
    if (local.length === 0) {
      return this.inner.choose(serviceName, endpoints);
    }
    return this.inner.choose(`${serviceName}@${this.zone}`, local);
  }
}
