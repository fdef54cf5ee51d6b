/**
 * @switchyard/dispatch - Selection Strategies
 */

export { RoundRobinStrategy } from "./round-robin.js";
export { WeightedStrategy, endpointWeight, WEIGHT_METADATA_KEY } from "./weighted.js";
export { ZoneAwareStrategy, ZONE_METADATA_KEY, type ZoneAwareOptions } from "./zone-aware.js";
export {
  AvailabilityFilteringStrategy,
  type AvailabilityFilteringOptions,
  type EndpointHealthSource,
} from "./availability.js";
