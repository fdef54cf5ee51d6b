/**
 * @switchyard/dispatch - Client Factory
 * Builds one plain function per contract method.
 */

import { describeProblems, type, type Schema } from "@switchyard/types";
import { MalformedTargetError, ResponseDecodeError } from "../errors.js";
import type { DispatchHandler, DispatchResponse, HeaderMap, LogicalRequest } from "../types.js";
import type { ClientContract, MethodDefinition, MethodDefinitions } from "./define.js";
import { normalizeServiceName } from "./registry.js";

// ============================================================================
// TYPES
// ============================================================================

export type QueryValue = string | number | boolean;

/**
 * Arguments of one client call
 */
export interface CallArgs {
  /** Values for `{param}` placeholders in the method path */
  params?: Record<string, QueryValue>;
  /** Query parameters; arrays repeat the key, undefined values are skipped */
  query?: Record<string, QueryValue | readonly QueryValue[] | undefined>;
  /** JSON-encoded request body */
  body?: unknown;
  headers?: HeaderMap;
  signal?: AbortSignal;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
}

/** Resolves to the decoded body, or undefined for an empty response */
export type ClientMethod<TResponse> = (args?: CallArgs) => Promise<TResponse | undefined>;

export type ResponseOf<TDefinition> = TDefinition extends { response?: Schema<infer R> } ? R : unknown;

export type ClientOf<TMethods extends MethodDefinitions> = {
  readonly [K in keyof TMethods]: ClientMethod<ResponseOf<TMethods[K]>>;
};

export interface CreateClientOptions {
  /** Service to dispatch to (default: the contract name) */
  serviceName?: string;
}

// ============================================================================
// REQUEST BUILDING
// ============================================================================

const PLACEHOLDER = /\{([^{}]+)\}/g;

/**
 * Replace `{param}` placeholders with URI-encoded values.
 *
 * @throws MalformedTargetError for a placeholder without a value
 */
export function expandPath(
  template: string,
  params: Record<string, QueryValue> = {},
  serviceName?: string
): string {
  const missing: string[] = [];
  const expanded = template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      missing.push(name);
      return "";
    }
    return encodeURIComponent(String(value));
  });

  if (missing.length > 0) {
    throw new MalformedTargetError(
      template,
      `missing path parameter${missing.length > 1 ? "s" : ""} ${missing.map((m) => `"${m}"`).join(", ")}`,
      serviceName
    );
  }
  return expanded;
}

/**
 * Encode query parameters, in insertion order. Returns "" when there are none.
 */
export function encodeQuery(query: CallArgs["query"] = {}): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    const values: readonly QueryValue[] = Array.isArray(value) ? value : [value];
    for (const item of values) {
      params.append(key, String(item));
    }
  }
  const encoded = params.toString();
  return encoded === "" ? "" : `?${encoded}`;
}

/**
 * Logical request for one method call
 */
export function buildLogicalRequest(
  serviceName: string,
  definition: MethodDefinition<unknown>,
  args: CallArgs = {}
): LogicalRequest {
  const headers: HeaderMap = { accept: "application/json", ...definition.headers };
  let body: Uint8Array | undefined;

  if (args.body !== undefined) {
    body = new TextEncoder().encode(JSON.stringify(args.body));
    headers["content-type"] = "application/json";
  }
  Object.assign(headers, args.headers);

  const path = expandPath(definition.path, args.params, serviceName);
  return Object.freeze({
    serviceName,
    url: `http://${serviceName}${path}${encodeQuery(args.query)}`,
    method: definition.method,
    headers: Object.freeze(headers),
    body,
    connectTimeoutMs: args.connectTimeoutMs,
    readTimeoutMs: args.readTimeoutMs,
  });
}

/**
 * Decode a JSON response body. Empty responses and empty bodies decode to
 * undefined.
 *
 * @throws ResponseDecodeError for invalid JSON or a schema mismatch
 */
export function decodeResponse(
  serviceName: string,
  response: DispatchResponse,
  schema?: Schema<unknown>
): unknown {
  if (response.empty || response.body.byteLength === 0) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(response.body));
  } catch (error) {
    throw new ResponseDecodeError(serviceName, [error instanceof Error ? error.message : String(error)], error);
  }

  if (!schema) {
    return parsed;
  }
  const result = schema(parsed);
  if (result instanceof type.errors) {
    throw new ResponseDecodeError(serviceName, describeProblems(result));
  }
  return result;
}

// ============================================================================
// CLIENT FACTORY
// ============================================================================

function bindMethod(
  serviceName: string,
  definition: MethodDefinition<unknown>,
  dispatcher: DispatchHandler
): ClientMethod<unknown> {
  return async (args: CallArgs = {}): Promise<unknown> => {
    const request = buildLogicalRequest(serviceName, definition, args);
    const response = await dispatcher.dispatch(serviceName, request, { signal: args.signal });
    return decodeResponse(serviceName, response, definition.response);
  };
}

/**
 * Build a client whose methods dispatch through `dispatcher`.
 *
 * @example
 * ```typescript
 * const orders = createClient(ordersClient, dispatcher);
 * const order = await orders.getOrder({ params: { id: '42' } });
 * ```
 */
export function createClient<TMethods extends MethodDefinitions>(
  contract: ClientContract<TMethods>,
  dispatcher: DispatchHandler,
  options: CreateClientOptions = {}
): ClientOf<TMethods> {
  const serviceName = normalizeServiceName(options.serviceName ?? contract.name);
  const client: Record<string, ClientMethod<unknown>> = {};

  for (const [methodName, definition] of Object.entries(contract.methods)) {
    client[methodName] = bindMethod(serviceName, definition, dispatcher);
  }

  return Object.freeze(client) as ClientOf<TMethods>;
}
