/**
 * @switchyard/dispatch - Type Definitions
 * Requests, endpoints, resolved options and the collaborator interfaces
 * the dispatcher consumes.
 */

import type { DispatchErrorKind, LoggerLevel } from "@switchyard/types";

export type { DispatchErrorKind, LoggerLevel } from "@switchyard/types";

// ============================================================================
// ENDPOINTS
// ============================================================================

/**
 * One concrete, reachable instance of a named service. Registries replace
 * endpoint lists; an endpoint is never mutated.
 */
export interface Endpoint {
  readonly host: string;
  readonly port: number;
  readonly secure: boolean;
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * Source of endpoint lists. Unknown services yield an empty list.
 */
export interface EndpointRegistry {
  listEndpoints(serviceName: string): readonly Endpoint[] | Promise<readonly Endpoint[]>;
}

/**
 * Picks one endpoint among candidates. State, if any, is kept per service name.
 */
export interface SelectionStrategy {
  readonly name: string;
  /** @throws NoEndpointsAvailableError when `endpoints` is empty */
  choose(serviceName: string, endpoints: readonly Endpoint[]): Endpoint;
}

// ============================================================================
// REQUESTS & RESPONSES
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export type HeaderMap = Record<string, string>;

/**
 * Request addressed by service name: `scheme://{serviceName}[/{path}][?query]`.
 */
export interface LogicalRequest {
  readonly serviceName: string;
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<HeaderMap>;
  readonly body?: Uint8Array | undefined;
  /** Per-call overrides of the resolved timeouts */
  readonly connectTimeoutMs?: number | undefined;
  readonly readTimeoutMs?: number | undefined;
}

/**
 * Request addressed to a concrete host and port. Frozen; lives for one
 * dispatch attempt.
 */
export interface PhysicalRequest {
  readonly serviceName: string;
  readonly endpoint: Endpoint;
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<HeaderMap>;
  readonly body: Uint8Array | undefined;
}

/**
 * Mutable view handed to request interceptors. The service and the chosen
 * endpoint cannot be changed.
 */
export interface RequestTemplate {
  readonly serviceName: string;
  readonly endpoint: Endpoint;
  method: HttpMethod;
  url: string;
  headers: HeaderMap;
  body: Uint8Array | undefined;
}

export interface RawResponse {
  readonly status: number;
  readonly headers: Readonly<HeaderMap>;
  readonly body: Uint8Array;
}

export interface DispatchResponse extends RawResponse {
  /** True only for the {@link EMPTY_RESPONSE} sentinel */
  readonly empty: boolean;
}

/**
 * Returned instead of an error for a 404 when the service decodes
 * "not found" as empty.
 */
export const EMPTY_RESPONSE: DispatchResponse = {
  status: 404,
  headers: {},
  body: new Uint8Array(0),
  empty: true,
};
Object.freeze(EMPTY_RESPONSE.headers);
Object.freeze(EMPTY_RESPONSE);

// ============================================================================
// TRANSPORT
// ============================================================================

export interface TransportOptions {
  connectTimeoutMs: number;
  readTimeoutMs: number;
  signal?: AbortSignal | undefined;
}

/**
 * Executes physical requests. Network failures reject with their cause
 * chain intact.
 */
export interface Transport {
  readonly name: string;
  execute(request: PhysicalRequest, options: TransportOptions): Promise<RawResponse>;
}

// ============================================================================
// SERVICE OPTIONS
// ============================================================================

/**
 * Attempts for one call, all against the endpoint chosen for it.
 */
export interface RetryPolicy {
  /** Total attempts, including the first */
  readonly maxAttempts: number;
  readonly backoff: "linear" | "exponential";
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  /** Failure kinds worth another attempt */
  readonly retryOn: readonly DispatchErrorKind[];
}

export interface ErrorDecodeContext {
  serviceName: string;
  request: PhysicalRequest;
  response: RawResponse;
}

/**
 * Turns a non-2xx response into the error the caller sees.
 */
export interface ErrorDecoder {
  readonly name: string;
  decode(context: ErrorDecodeContext): Error;
}

export interface RequestInterceptor {
  readonly name: string;
  apply(template: RequestTemplate): void | Promise<void>;
}

/**
 * Fully resolved configuration for one service. Frozen.
 */
export interface ServiceOptions {
  readonly connectTimeoutMs: number;
  readonly readTimeoutMs: number;
  readonly loggerLevel: LoggerLevel;
  readonly retryPolicy: RetryPolicy | undefined;
  readonly errorDecoder: ErrorDecoder;
  readonly interceptors: readonly RequestInterceptor[];
  readonly decodeNotFoundAsEmpty: boolean;
}

/**
 * One configuration tier. An absent field falls through to lower tiers; an
 * empty `interceptors` list clears what lower tiers contributed.
 */
export interface ServiceOptionsTier {
  connectTimeoutMs?: number | undefined;
  readTimeoutMs?: number | undefined;
  loggerLevel?: LoggerLevel | undefined;
  retryPolicy?: RetryPolicy | undefined;
  errorDecoder?: ErrorDecoder | undefined;
  interceptors?: readonly RequestInterceptor[] | undefined;
  decodeNotFoundAsEmpty?: boolean | undefined;
}

// ============================================================================
// STATISTICS
// ============================================================================

/**
 * Result of one dispatch attempt, or of a call that failed before reaching
 * the transport.
 */
export interface DispatchOutcome {
  readonly serviceName: string;
  readonly endpoint: Endpoint | undefined;
  readonly success: boolean;
  readonly errorKind: DispatchErrorKind | undefined;
  readonly status: number | undefined;
  readonly latencyMs: number;
  /** 1-based attempt number */
  readonly attempt: number;
}

export interface StatsRecorder {
  /** Must not throw */
  observe(outcome: DispatchOutcome): void;
}

// ============================================================================
// DISPATCH
// ============================================================================

export interface DispatchOptions {
  signal?: AbortSignal | undefined;
  connectTimeoutMs?: number | undefined;
  readTimeoutMs?: number | undefined;
}

/**
 * The dispatcher's public contract. Decorators such as fallbacks implement
 * it as well.
 */
export interface DispatchHandler {
  dispatch(
    serviceName: string,
    request: LogicalRequest,
    options?: DispatchOptions
  ): Promise<DispatchResponse>;
}

/**
 * Registration data the dispatcher needs for one service.
 */
export interface ClientRegistration {
  readonly serviceName: string;
  /** Fixed base URL; endpoint selection is skipped when set */
  readonly url: string | undefined;
  /** Path prefix with a leading "/" and no trailing "/", or "" */
  readonly path: string;
  readonly decode404: boolean;
}

export interface RegistrationLookup {
  lookup(serviceName: string): ClientRegistration | undefined;
}
