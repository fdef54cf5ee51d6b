/**
 * @switchyard/dispatch - Statistics recorder tests
 */

import { describe, it, expect } from "vitest";
import { Logger, type LogEntry, type LogTransport } from "@switchyard/core";
import { toEndpoint } from "../src/registry.js";
import { InMemoryStatsRecorder, endpointKey } from "../src/stats/recorder.js";
import type { DispatchOutcome } from "../src/types.js";

const a = toEndpoint({ host: "10.0.0.5", port: 8080, secure: false });
const b = toEndpoint({ host: "10.0.0.6", port: 8080, secure: false });

function outcome(overrides: Partial<DispatchOutcome> = {}): DispatchOutcome {
  return {
    serviceName: "orders",
    endpoint: a,
    success: true,
    errorKind: undefined,
    status: 200,
    latencyMs: 10,
    attempt: 1,
    ...overrides,
  };
}

class MemoryTransport implements LogTransport {
  readonly name = "memory";
  readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

describe("InMemoryStatsRecorder", () => {
  it("should aggregate outcomes per endpoint", () => {
    const recorder = new InMemoryStatsRecorder();
    recorder.observe(outcome({ latencyMs: 10 }));
    recorder.observe(outcome({ latencyMs: 30, success: false, errorKind: "io-failure", status: undefined }));

    expect(recorder.endpointStats("orders", a)).toEqual({
      requests: 2,
      failures: 1,
      consecutiveFailures: 1,
      lastLatencyMs: 30,
      meanLatencyMs: 20,
      lastStatus: undefined,
      errorsByKind: { "io-failure": 1 },
    });
    expect(recorder.endpointStats("orders", b)).toBeUndefined();
  });

  it("should reset consecutive failures on success", () => {
    const recorder = new InMemoryStatsRecorder();
    recorder.observe(outcome({ success: false, errorKind: "unexpected", status: 500 }));
    recorder.observe(outcome({ success: false, errorKind: "unexpected", status: 500 }));
    expect(recorder.endpointStats("orders", a)?.consecutiveFailures).toBe(2);

    recorder.observe(outcome());
    expect(recorder.endpointStats("orders", a)?.consecutiveFailures).toBe(0);
    expect(recorder.endpointStats("orders", a)?.failures).toBe(2);
  });

  it("should keep outcomes without an endpoint apart", () => {
    const recorder = new InMemoryStatsRecorder();
    recorder.observe(outcome({ endpoint: undefined, success: false, errorKind: "no-instances", status: undefined }));
    recorder.observe(outcome({ endpoint: b }));

    const snapshot = recorder.snapshot("orders");
    expect(snapshot.requests).toBe(2);
    expect(snapshot.failures).toBe(1);
    expect(snapshot.unrouted.errorsByKind).toEqual({ "no-instances": 1 });
    expect(snapshot.endpoints.map((e) => e.key)).toEqual([endpointKey(b)]);
  });

  it("should return an empty snapshot for unknown services", () => {
    const snapshot = new InMemoryStatsRecorder().snapshot("billing");
    expect(snapshot.requests).toBe(0);
    expect(snapshot.endpoints).toEqual([]);
    expect(snapshot.unrouted.meanLatencyMs).toBe(0);
  });

  it("should log and drop invalid outcomes instead of throwing", () => {
    const transport = new MemoryTransport();
    const recorder = new InMemoryStatsRecorder({
      logger: new Logger({ level: "INFO", transports: [transport] }),
    });

    expect(() => recorder.observe(outcome({ latencyMs: Number.NaN }))).not.toThrow();
    expect(recorder.snapshot("orders").requests).toBe(0);
    expect(transport.entries[0]?.message).toBe("Dropped dispatch outcome");
    expect(transport.entries[0]?.error?.message).toBe("Invalid latency: NaN");
  });

  it("should forget a service on reset", () => {
    const recorder = new InMemoryStatsRecorder();
    recorder.observe(outcome());
    recorder.observe(outcome({ serviceName: "billing" }));
    recorder.reset("orders");

    expect(recorder.snapshot("orders").requests).toBe(0);
    expect(recorder.snapshot("billing").requests).toBe(1);
  });
});
