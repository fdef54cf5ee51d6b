/**
 * @module
 * Load-balanced dispatch of service-addressed requests.
 *
 * @example
 * ```typescript
 * import {
 *   ClientRegistry,
 *   Dispatcher,
 *   FetchTransport,
 *   ServiceConfigStore,
 *   StaticEndpointRegistry,
 *   createClient,
 *   defineClient,
 * } from '@switchyard/dispatch';
 *
 * const config = ServiceConfigStore.fromEnv();
 * const clients = new ClientRegistry(config);
 * const orders = defineClient({
 *   name: 'orders',
 *   methods: { getOrder: { method: 'GET', path: '/orders/{id}' } },
 * });
 * clients.registerClient('orders', orders, { readTimeoutMs: 2000 });
 *
 * const dispatcher = new Dispatcher({
 *   registry: new StaticEndpointRegistry({ orders: [{ host: '10.0.0.5', port: 8080, secure: false }] }),
 *   transport: new FetchTransport(),
 *   config,
 *   clients,
 * });
 *
 * const order = await createClient(orders, dispatcher).getOrder({ params: { id: '42' } });
 * ```
 */

// ============================================
// TYPES
// ============================================

export {
  EMPTY_RESPONSE,
  type ClientRegistration,
  type DispatchErrorKind,
  type DispatchHandler,
  type DispatchOptions,
  type DispatchOutcome,
  type DispatchResponse,
  type Endpoint,
  type EndpointRegistry,
  type ErrorDecodeContext,
  type ErrorDecoder,
  type HeaderMap,
  type HttpMethod,
  type LoggerLevel,
  type LogicalRequest,
  type PhysicalRequest,
  type RawResponse,
  type RegistrationLookup,
  type RequestInterceptor,
  type RequestTemplate,
  type RetryPolicy,
  type SelectionStrategy,
  type ServiceOptions,
  type ServiceOptionsTier,
  type StatsRecorder,
  type Transport,
  type TransportOptions,
} from "./types.js";

// ============================================
// ERRORS
// ============================================

export {
  DispatchError,
  NoInstancesAvailableError,
  NoEndpointsAvailableError,
  MalformedTargetError,
  IoFailureError,
  UnexpectedDispatchError,
  HttpStatusError,
  CanceledError,
  ResponseDecodeError,
  classifyError,
  findIoFailure,
  isIoShaped,
} from "./errors.js";

// ============================================
// ENDPOINTS & SELECTION
// ============================================

export { StaticEndpointRegistry, parseEndpoints, toEndpoint } from "./registry.js";
export * from "./selection/index.js";

// ============================================
// REWRITING
// ============================================

export {
  parseTarget,
  withPathPrefix,
  rewriteUrl,
  parseServiceTarget,
  assertRoutable,
  rebaseUrl,
  endpointFromUrl,
  rewriteRequest,
  toPhysicalRequest,
  type TargetParts,
} from "./rewrite.js";

// ============================================
// CONFIGURATION
// ============================================

export * from "./config/index.js";

// ============================================
// STATISTICS
// ============================================

export {
  InMemoryStatsRecorder,
  endpointKey,
  type EndpointStats,
  type EndpointStatsEntry,
  type ServiceStats,
} from "./stats/recorder.js";

// ============================================
// DISPATCH
// ============================================

export { Dispatcher, createDispatcher, type DispatcherOptions } from "./dispatcher.js";
export { withFallback, type FallbackContext, type FallbackFn, type FallbackOptions } from "./fallback.js";
export * from "./resilience/index.js";
export { FetchTransport, createFetchTransport, type FetchFn, type FetchTransportOptions } from "./transports/fetch.js";

// ============================================
// CLIENTS
// ============================================

export * from "./client/index.js";
