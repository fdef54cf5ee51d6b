/**
 * @switchyard/dispatch - Dispatcher
 * Resolves a service name to an endpoint, rewrites the request, runs it
 * through the transport and records the outcome.
 */

import { createLogger, logError, type Logger } from "@switchyard/core";
import { DEFAULT_SERVICE_OPTIONS } from "./config/defaults.js";
import { ServiceConfigStore } from "./config/store.js";
import { CanceledError, classifyError, NoInstancesAvailableError, type DispatchError } from "./errors.js";
import { retryOptionsFromPolicy, withRetry } from "./resilience/retry.js";
import {
  endpointFromUrl,
  parseServiceTarget,
  rebaseUrl,
  rewriteUrl,
  toPhysicalRequest,
  withPathPrefix,
} from "./rewrite.js";
import { RoundRobinStrategy } from "./selection/round-robin.js";
import { InMemoryStatsRecorder } from "./stats/recorder.js";
import {
  EMPTY_RESPONSE,
  type DispatchHandler,
  type DispatchOptions,
  type DispatchOutcome,
  type DispatchResponse,
  type Endpoint,
  type EndpointRegistry,
  type LogicalRequest,
  type PhysicalRequest,
  type RawResponse,
  type RegistrationLookup,
  type RequestInterceptor,
  type RequestTemplate,
  type SelectionStrategy,
  type ServiceOptions,
  type StatsRecorder,
  type Transport,
  type TransportOptions,
} from "./types.js";

// ============================================================================
// OPTIONS
// ============================================================================

export interface DispatcherOptions {
  /** Endpoint lists per service */
  registry: EndpointRegistry;
  /** Executes physical requests */
  transport: Transport;
  /** Resolved options per service (default: an empty store) */
  config?: Pick<ServiceConfigStore, "resolve">;
  /** Receives one outcome per attempt (default: in-memory recorder) */
  recorder?: StatsRecorder;
  /** Client registrations, for fixed URLs and path prefixes */
  clients?: RegistrationLookup;
  /** Strategy for services without their own (default: round-robin) */
  strategy?: SelectionStrategy;
  /** Per-service strategies */
  strategies?: Record<string, SelectionStrategy>;
  logger?: Logger;
  /** Millisecond clock used for latency */
  now?: () => number;
}

interface Target {
  endpoint: Endpoint;
  url: string;
}

type AttemptResult =
  | { ok: true; response: DispatchResponse; status: number }
  | { ok: false; error: DispatchError; status: number | undefined };

const HEADER_REDACTIONS = [
  "requestHeaders.authorization",
  "requestHeaders.cookie",
  "requestHeaders.proxy-authorization",
  "responseHeaders.set-cookie",
];

function throwIfCanceled(serviceName: string, signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CanceledError(serviceName, signal.reason);
  }
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Run interceptors in order over a mutable copy of the request. The
 * service name and endpoint of the result always come from `request`.
 */
async function applyInterceptors(
  request: PhysicalRequest,
  interceptors: readonly RequestInterceptor[]
): Promise<PhysicalRequest> {
  if (interceptors.length === 0) {
    return request;
  }

  const template: RequestTemplate = {
    serviceName: request.serviceName,
    endpoint: request.endpoint,
    method: request.method,
    url: request.url,
    headers: { ...request.headers },
    body: request.body,
  };
  for (const interceptor of interceptors) {
    await interceptor.apply(template);
  }

  return Object.freeze({
    serviceName: request.serviceName,
    endpoint: request.endpoint,
    url: template.url,
    method: template.method,
    headers: Object.freeze({ ...template.headers }),
    body: template.body,
  });
}

// ============================================================================
// DISPATCHER
// ============================================================================

/**
 * Load-balanced dispatcher. Holds no per-call state; everything a call
 * needs is read from one frozen {@link ServiceOptions} snapshot.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher({
 *   registry: new StaticEndpointRegistry({ orders: [{ host: '10.0.0.5', port: 8080, secure: false }] }),
 *   transport: new FetchTransport(),
 * });
 *
 * const response = await dispatcher.dispatch('orders', {
 *   serviceName: 'orders',
 *   url: 'http://orders/items/42',
 *   method: 'GET',
 *   headers: {},
 * });
 * ```
 */
export class Dispatcher implements DispatchHandler {
  readonly recorder: StatsRecorder;
  private readonly registry: EndpointRegistry;
  private readonly transport: Transport;
  private readonly config: Pick<ServiceConfigStore, "resolve">;
  private readonly clients: RegistrationLookup | undefined;
  private readonly defaultStrategy: SelectionStrategy;
  private readonly strategies: Map<string, SelectionStrategy>;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.transport = options.transport;
    this.logger = (options.logger ?? createLogger({ name: "dispatch" })).child(
      {},
      { redact: HEADER_REDACTIONS }
    );
    this.config = options.config ?? new ServiceConfigStore({ logger: this.logger });
    this.recorder = options.recorder ?? new InMemoryStatsRecorder({ logger: this.logger });
    this.clients = options.clients;
    this.defaultStrategy = options.strategy ?? new RoundRobinStrategy();
    this.strategies = new Map(Object.entries(options.strategies ?? {}));
    this.now = options.now ?? (() => performance.now());
  }

  /** Use a dedicated strategy for one service */
  setStrategy(serviceName: string, strategy: SelectionStrategy): void {
    this.strategies.set(serviceName, strategy);
  }

  async dispatch(
    serviceName: string,
    request: LogicalRequest,
    options: DispatchOptions = {}
  ): Promise<DispatchResponse> {
    const signal = options.signal;
    const started = this.now();

    let serviceOptions: ServiceOptions = DEFAULT_SERVICE_OPTIONS;
    let target: Target;
    try {
      serviceOptions = this.config.resolve(serviceName);
      throwIfCanceled(serviceName, signal);
      target = await this.resolveTarget(serviceName, request);
    } catch (error) {
      const failure = classifyError(error, serviceName, signal);
      this.record({
        serviceName,
        endpoint: undefined,
        success: false,
        errorKind: failure.kind,
        status: undefined,
        latencyMs: this.now() - started,
        attempt: 1,
      });
      if (serviceOptions.loggerLevel !== "NONE") {
        this.logger.warn("Dispatch failed before transport", {
          service: serviceName,
          method: request.method,
          url: request.url,
          kind: failure.kind,
          reason: failure.message,
        });
      }
      throw failure;
    }

    const physical = toPhysicalRequest(target.endpoint, request, target.url, serviceName);
    const transportOptions: TransportOptions = {
      connectTimeoutMs:
        options.connectTimeoutMs ?? request.connectTimeoutMs ?? serviceOptions.connectTimeoutMs,
      readTimeoutMs: options.readTimeoutMs ?? request.readTimeoutMs ?? serviceOptions.readTimeoutMs,
      signal,
    };

    const attempt = (attemptNumber: number): Promise<DispatchResponse> =>
      this.attempt(physical, serviceOptions, transportOptions, attemptNumber);

    const policy = serviceOptions.retryPolicy;
    if (!policy || policy.maxAttempts <= 1) {
      return attempt(1);
    }

    const retrying = withRetry(
      attempt,
      retryOptionsFromPolicy(policy, {
        signal,
        onRetry: (error, attemptNumber, delay) => {
          this.logger.debug("Retrying dispatch", {
            service: serviceName,
            attempt: attemptNumber + 1,
            delayMs: delay,
            kind: error instanceof Error ? error.name : typeof error,
          });
        },
      })
    );
    try {
      return await retrying();
    } catch (error) {
      // An abort during backoff rejects with the bare abort reason
      throw classifyError(error, serviceName, signal);
    }
  }

  /**
   * Choose the endpoint and build the physical URL. Fixed-URL registrations
   * skip the registry.
   */
  private async resolveTarget(serviceName: string, request: LogicalRequest): Promise<Target> {
    parseServiceTarget(request.url, serviceName);
    const registration = this.clients?.lookup(serviceName);
    const prefix = registration?.path ?? "";

    if (registration?.url !== undefined) {
      const base = `${registration.url}${prefix}`;
      return {
        endpoint: endpointFromUrl(registration.url, serviceName),
        url: rebaseUrl(base, request.url, serviceName),
      };
    }

    const endpoints = await this.registry.listEndpoints(serviceName);
    if (endpoints.length === 0) {
      throw new NoInstancesAvailableError(serviceName);
    }

    const strategy = this.strategies.get(serviceName) ?? this.defaultStrategy;
    const endpoint = strategy.choose(serviceName, endpoints);
    this.logger.trace("Endpoint chosen", {
      service: serviceName,
      strategy: strategy.name,
      host: endpoint.host,
      port: endpoint.port,
    });

    return {
      endpoint,
      url: rewriteUrl(endpoint, withPathPrefix(request.url, prefix, serviceName), serviceName),
    };
  }

  /**
   * One attempt: interceptors, transport, classification and recording.
   */
  private async attempt(
    physical: PhysicalRequest,
    serviceOptions: ServiceOptions,
    transportOptions: TransportOptions,
    attemptNumber: number
  ): Promise<DispatchResponse> {
    const { serviceName, endpoint } = physical;
    const started = this.now();
    let outgoing = physical;
    let result: AttemptResult;

    try {
      throwIfCanceled(serviceName, transportOptions.signal);
      outgoing = await applyInterceptors(physical, serviceOptions.interceptors);
      throwIfCanceled(serviceName, transportOptions.signal);

      const raw = await this.transport.execute(outgoing, transportOptions);
      try {
        result = { ok: true, response: this.interpret(outgoing, raw, serviceOptions), status: raw.status };
      } catch (error) {
        result = { ok: false, error: classifyError(error, serviceName, transportOptions.signal), status: raw.status };
      }
    } catch (error) {
      result = { ok: false, error: classifyError(error, serviceName, transportOptions.signal), status: undefined };
    }

    const latencyMs = this.now() - started;
    this.record({
      serviceName,
      endpoint,
      success: result.ok,
      errorKind: result.ok ? undefined : result.error.kind,
      status: result.status,
      latencyMs,
      attempt: attemptNumber,
    });
    this.logExchange(serviceOptions, outgoing, result, latencyMs, attemptNumber);

    if (!result.ok) {
      throw result.error;
    }
    return result.response;
  }

  /**
   * 2xx passes; 404 becomes the empty sentinel when configured; anything
   * else is thrown as the error decoder's result.
   */
  private interpret(
    request: PhysicalRequest,
    raw: RawResponse,
    serviceOptions: ServiceOptions
  ): DispatchResponse {
    if (isSuccessStatus(raw.status)) {
      return Object.freeze({ status: raw.status, headers: raw.headers, body: raw.body, empty: false });
    }
    if (raw.status === 404 && serviceOptions.decodeNotFoundAsEmpty) {
      return EMPTY_RESPONSE;
    }
    throw serviceOptions.errorDecoder.decode({
      serviceName: request.serviceName,
      request,
      response: raw,
    });
  }

  private record(outcome: DispatchOutcome): void {
    try {
      this.recorder.observe(outcome);
    } catch (error) {
      logError(this.logger, error, "Statistics recorder failed", { service: outcome.serviceName });
    }
  }

  private logExchange(
    serviceOptions: ServiceOptions,
    request: PhysicalRequest,
    result: AttemptResult,
    latencyMs: number,
    attemptNumber: number
  ): void {
    const level = serviceOptions.loggerLevel;
    if (level === "NONE") {
      return;
    }

    const context: Record<string, unknown> = {
      service: request.serviceName,
      method: request.method,
      url: request.url,
      status: result.status,
      latencyMs: Math.round(latencyMs),
      attempt: attemptNumber,
    };
    if (level === "HEADERS" || level === "FULL") {
      context["requestHeaders"] = request.headers;
      if (result.ok) {
        context["responseHeaders"] = result.response.headers;
      }
    }
    if (level === "FULL") {
      context["requestBytes"] = request.body?.byteLength ?? 0;
      if (result.ok) {
        context["responseBytes"] = result.response.body.byteLength;
      }
    }

    if (result.ok) {
      this.logger.info("Dispatch succeeded", context);
    } else {
      this.logger.warn("Dispatch failed", { ...context, kind: result.error.kind, reason: result.error.message });
    }
  }
}

/**
 * Create a dispatcher.
 */
export function createDispatcher(options: DispatcherOptions): Dispatcher {
  return new Dispatcher(options);
}
