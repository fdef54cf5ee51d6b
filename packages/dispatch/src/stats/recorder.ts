/**
 * @switchyard/dispatch - Statistics Recorder
 * Per-service, per-endpoint outcome aggregates.
 */

import { createLogger, logError, type Logger } from "@switchyard/core";
import type { DispatchErrorKind, DispatchOutcome, Endpoint, StatsRecorder } from "../types.js";

// ============================================================================
// TYPES
// ============================================================================

export interface EndpointStats {
  readonly requests: number;
  readonly failures: number;
  readonly consecutiveFailures: number;
  readonly lastLatencyMs: number | undefined;
  readonly meanLatencyMs: number;
  readonly lastStatus: number | undefined;
  readonly errorsByKind: Readonly<Partial<Record<DispatchErrorKind, number>>>;
}

export interface EndpointStatsEntry {
  /** `host:port` */
  readonly key: string;
  readonly endpoint: Endpoint;
  readonly stats: EndpointStats;
}

export interface ServiceStats {
  readonly serviceName: string;
  readonly requests: number;
  readonly failures: number;
  /** Outcomes recorded before an endpoint was chosen */
  readonly unrouted: EndpointStats;
  readonly endpoints: readonly EndpointStatsEntry[];
}

interface MutableStats {
  requests: number;
  failures: number;
  consecutiveFailures: number;
  lastLatencyMs: number | undefined;
  totalLatencyMs: number;
  lastStatus: number | undefined;
  errorsByKind: Partial<Record<DispatchErrorKind, number>>;
}

interface ServiceEntry {
  unrouted: MutableStats;
  endpoints: Map<string, { endpoint: Endpoint; stats: MutableStats }>;
}

function emptyStats(): MutableStats {
  return {
    requests: 0,
    failures: 0,
    consecutiveFailures: 0,
    lastLatencyMs: undefined,
    totalLatencyMs: 0,
    lastStatus: undefined,
    errorsByKind: {},
  };
}

function freezeStats(stats: MutableStats): EndpointStats {
  return Object.freeze({
    requests: stats.requests,
    failures: stats.failures,
    consecutiveFailures: stats.consecutiveFailures,
    lastLatencyMs: stats.lastLatencyMs,
    meanLatencyMs: stats.requests === 0 ? 0 : stats.totalLatencyMs / stats.requests,
    lastStatus: stats.lastStatus,
    errorsByKind: Object.freeze({ ...stats.errorsByKind }),
  });
}

export function endpointKey(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

// ============================================================================
// IN-MEMORY RECORDER
// ============================================================================

/**
 * Keeps aggregates in memory. `observe` never throws: a rejected outcome is
 * logged and dropped.
 *
 * @example
 * ```typescript
 * const recorder = new InMemoryStatsRecorder();
 * const dispatcher = new Dispatcher({ ..., recorder });
 * recorder.snapshot('orders').failures;
 * ```
 */
export class InMemoryStatsRecorder implements StatsRecorder {
  private readonly services = new Map<string, ServiceEntry>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger({ name: "stats" });
  }

  observe(outcome: DispatchOutcome): void {
    try {
      this.apply(outcome);
    } catch (error) {
      logError(this.logger, error, "Dropped dispatch outcome", {
        service: outcome.serviceName,
      });
    }
  }

  private apply(outcome: DispatchOutcome): void {
    if (!Number.isFinite(outcome.latencyMs) || outcome.latencyMs < 0) {
      throw new RangeError(`Invalid latency: ${outcome.latencyMs}`);
    }

    let service = this.services.get(outcome.serviceName);
    if (!service) {
      service = { unrouted: emptyStats(), endpoints: new Map() };
      this.services.set(outcome.serviceName, service);
    }

    let stats: MutableStats;
    if (outcome.endpoint) {
      const key = endpointKey(outcome.endpoint);
      let entry = service.endpoints.get(key);
      if (!entry) {
        entry = { endpoint: outcome.endpoint, stats: emptyStats() };
        service.endpoints.set(key, entry);
      }
      stats = entry.stats;
    } else {
      stats = service.unrouted;
    }

    stats.requests += 1;
    stats.lastLatencyMs = outcome.latencyMs;
    stats.totalLatencyMs += outcome.latencyMs;
    stats.lastStatus = outcome.status;

    if (outcome.success) {
      stats.consecutiveFailures = 0;
    } else {
      stats.failures += 1;
      stats.consecutiveFailures += 1;
      const kind = outcome.errorKind ?? "unexpected";
      stats.errorsByKind[kind] = (stats.errorsByKind[kind] ?? 0) + 1;
    }
  }

  /**
   * Aggregates for one endpoint, or undefined when it has no outcomes yet
   */
  endpointStats(serviceName: string, endpoint: Endpoint): EndpointStats | undefined {
    const entry = this.services.get(serviceName)?.endpoints.get(endpointKey(endpoint));
    return entry ? freezeStats(entry.stats) : undefined;
  }

  snapshot(serviceName: string): ServiceStats {
    const service = this.services.get(serviceName);
    const unrouted = freezeStats(service?.unrouted ?? emptyStats());
    const endpoints: EndpointStatsEntry[] = [];
    let requests = unrouted.requests;
    let failures = unrouted.failures;

    for (const [key, entry] of service?.endpoints ?? []) {
      const stats = freezeStats(entry.stats);
      requests += stats.requests;
      failures += stats.failures;
      endpoints.push(Object.freeze({ key, endpoint: entry.endpoint, stats }));
    }

    return Object.freeze({
      serviceName,
      requests,
      failures,
      unrouted,
      endpoints: Object.freeze(endpoints),
    });
  }

  reset(serviceName?: string): void {
    if (serviceName === undefined) {
      this.services.clear();
    } else {
      this.services.delete(serviceName);
    }
  }
}
