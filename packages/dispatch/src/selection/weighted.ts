/**
 * @switchyard/dispatch - Weighted Selection
 * Smooth weighted round-robin over endpoint metadata `weight`.
 */

import { NoEndpointsAvailableError } from "../errors.js";
import type { Endpoint, SelectionStrategy } from "../types.js";

/** Metadata key holding an endpoint's weight */
export const WEIGHT_METADATA_KEY = "weight";

/**
 * Weight of an endpoint: a positive integer from metadata, 1 otherwise.
 */
export function endpointWeight(endpoint: Endpoint): number {
  const raw = endpoint.metadata[WEIGHT_METADATA_KEY];
  if (raw === undefined) return 1;
  const weight = Number.parseInt(raw, 10);
  return Number.isInteger(weight) && weight > 0 ? weight : 1;
}

function endpointKey(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

/**
 * Each call adds every candidate's weight to its running score, picks the
 * highest score (first wins ties) and subtracts the total weight from the
 * winner. Weights 5/1/1 yield `a a b a c a a`, spreading the light
 * endpoints through the cycle.
 */
export class WeightedStrategy implements SelectionStrategy {
  readonly name = "weighted";
  private readonly scores = new Map<string, Map<string, number>>();

  choose(serviceName: string, endpoints: readonly Endpoint[]): Endpoint {
    if (endpoints.length === 0) {
      throw new NoEndpointsAvailableError(serviceName);
    }

    const previous = this.scores.get(serviceName);
    const current = new Map<string, number>();
    let total = 0;
    let best: Endpoint | undefined;
    let bestScore = Number.NEGATIVE_INFINITY;

    for (const endpoint of endpoints) {
      const key = endpointKey(endpoint);
      const weight = endpointWeight(endpoint);
      const score = (previous?.get(key) ?? 0) + weight;
      current.set(key, score);
      total += weight;
      if (score > bestScore) {
        bestScore = score;
        best = endpoint;
      }
    }

    if (!best) {
      throw new NoEndpointsAvailableError(serviceName);
    }

    current.set(endpointKey(best), bestScore - total);
    // Endpoints dropped from the list lose their score
    this.scores.set(serviceName, current);
    return best;
  }
}
