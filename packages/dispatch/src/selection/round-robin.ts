/**
 * @switchyard/dispatch - Round Robin Selection
 */

import { NoEndpointsAvailableError } from "../errors.js";
import type { Endpoint, SelectionStrategy } from "../types.js";

/**
 * Cycles through the candidates with one cursor per service. Reading and
 * advancing the cursor happen in the same synchronous step, so concurrent
 * dispatches never receive the same position.
 *
 * @example
 * ```typescript
 * const strategy = new RoundRobinStrategy();
 * strategy.choose('orders', endpoints); // endpoints[0]
 * strategy.choose('orders', endpoints); // endpoints[1]
 * ```
 */
export class RoundRobinStrategy implements SelectionStrategy {
  readonly name = "round-robin";
  private readonly cursors = new Map<string, number>();

  choose(serviceName: string, endpoints: readonly Endpoint[]): Endpoint {
    if (endpoints.length === 0) {
      throw new NoEndpointsAvailableError(serviceName);
    }

    const index = (this.cursors.get(serviceName) ?? 0) % endpoints.length;
    this.cursors.set(serviceName, (index + 1) % endpoints.length);

    const endpoint = endpoints[index];
    if (!endpoint) {
      throw new NoEndpointsAvailableError(serviceName);
    }
    return endpoint;
  }

  /** Forget the cursor of one service, or of all services */
  reset(serviceName?: string): void {
    if (serviceName === undefined) {
      this.cursors.clear();
    } else {
      this.cursors.delete(serviceName);
    }
  }
}
