/**
 * @switchyard/dispatch - URI Rewriting
 * Turns service-addressed URLs into host:port-addressed ones.
 *
 * Path and query are carried over as written; no URL normalisation is
 * applied to them.
 */

import { nonEmptyString, port, type } from "@switchyard/types";
import { MalformedTargetError } from "./errors.js";
import type { Endpoint, LogicalRequest, PhysicalRequest } from "./types.js";

const NO_METADATA: Readonly<Record<string, string>> = {};
Object.freeze(NO_METADATA);

const URL_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/([^/?#]*)(.*)$/s;

/**
 * A logical URL split into scheme, authority (the service name) and the
 * rest (path, query, fragment).
 */
export interface TargetParts {
  scheme: "http" | "https";
  authority: string;
  rest: string;
}

/**
 * @throws MalformedTargetError for a missing authority or a scheme other
 * than http/https
 */
export function parseTarget(url: string, serviceName?: string): TargetParts {
  const match = URL_PATTERN.exec(url);
  if (!match) {
    throw new MalformedTargetError(url, "no parseable authority", serviceName);
  }

  const [, rawScheme = "", authority = "", rest = ""] = match;
  const scheme = rawScheme.toLowerCase();
  if (scheme !== "http" && scheme !== "https") {
    throw new MalformedTargetError(url, `unsupported scheme "${rawScheme}"`, serviceName);
  }
  if (authority === "") {
    throw new MalformedTargetError(url, "no parseable authority", serviceName);
  }

  return { scheme, authority, rest };
}

/**
 * Parse a logical URL and check that it names `serviceName`. Host names
 * compare case-insensitively.
 *
 * @throws MalformedTargetError when the URL does not parse or is addressed
 * to another service
 */
export function parseServiceTarget(url: string, serviceName: string): TargetParts {
  const parts = parseTarget(url, serviceName);
  if (parts.authority.toLowerCase() !== serviceName.toLowerCase()) {
    throw new MalformedTargetError(url, `addressed to "${parts.authority}" instead of "${serviceName}"`, serviceName);
  }
  return parts;
}

/**
 * @throws MalformedTargetError unless the endpoint has a host and a port in 1..65535
 */
export function assertRoutable(endpoint: Endpoint, url: string, serviceName?: string): void {
  if (nonEmptyString(endpoint.host.trim()) instanceof type.errors) {
    throw new MalformedTargetError(url, "endpoint has no host", serviceName);
  }
  if (port(endpoint.port) instanceof type.errors) {
    throw new MalformedTargetError(url, `endpoint port ${endpoint.port} is not between 1 and 65535`, serviceName);
  }
}

function ensureLeadingSlash(rest: string): string {
  return rest.startsWith("/") ? rest : `/${rest}`;
}

function formatHost(host: string): string {
  return host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
}

/**
 * Insert a path prefix between the authority and the path:
 * `http://orders/items` + `/api` gives `http://orders/api/items`.
 */
export function withPathPrefix(url: string, prefix: string, serviceName?: string): string {
  if (prefix === "") return url;
  const { scheme, authority, rest } = parseTarget(url, serviceName);
  const tail = rest === "" || rest.startsWith("/") ? rest : `/${rest}`;
  return `${scheme}://${authority}${prefix}${tail}`;
}

/**
 * Readdress a logical URL to an endpoint.
 *
 * @throws MalformedTargetError for an unparseable URL or an endpoint
 * without a usable host and port
 *
 * @example
 * ```typescript
 * rewriteUrl({ host: '10.0.0.5', port: 8080, secure: true, metadata: {} }, 'http://orders');
 * // 'https://10.0.0.5:8080/'
 * ```
 */
export function rewriteUrl(endpoint: Endpoint, url: string, serviceName?: string): string {
  const { scheme, rest } = parseTarget(url, serviceName);
  assertRoutable(endpoint, url, serviceName);
  const physicalScheme = endpoint.secure ? "https" : scheme;
  return `${physicalScheme}://${formatHost(endpoint.host)}:${endpoint.port}${ensureLeadingSlash(rest)}`;
}

/**
 * Join a fixed base URL with the path and query of a logical URL.
 */
export function rebaseUrl(baseUrl: string, url: string, serviceName?: string): string {
  const { rest } = parseTarget(url, serviceName);
  return `${baseUrl}${ensureLeadingSlash(rest)}`;
}

/**
 * Endpoint standing for a fixed base URL. The port defaults to 80 or 443.
 *
 * @throws MalformedTargetError when the base URL does not parse
 */
export function endpointFromUrl(baseUrl: string, serviceName?: string): Endpoint {
  let parsed: URL;
  try {
    parsed = new URL(baseUrl);
  } catch (error) {
    throw new MalformedTargetError(baseUrl, error instanceof Error ? error.message : String(error), serviceName);
  }
  const secure = parsed.protocol === "https:";
  const host = parsed.hostname.startsWith("[") ? parsed.hostname.slice(1, -1) : parsed.hostname;
  return Object.freeze({
    host,
    port: parsed.port ? Number(parsed.port) : secure ? 443 : 80,
    secure,
    metadata: NO_METADATA,
  });
}

/**
 * Build the frozen physical request for one dispatch.
 */
export function rewriteRequest(endpoint: Endpoint, request: LogicalRequest): PhysicalRequest {
  return toPhysicalRequest(endpoint, request, rewriteUrl(endpoint, request.url, request.serviceName));
}

export function toPhysicalRequest(
  endpoint: Endpoint,
  request: LogicalRequest,
  url: string,
  serviceName: string = request.serviceName
): PhysicalRequest {
  return Object.freeze({
    serviceName,
    endpoint,
    url,
    method: request.method,
    headers: Object.freeze({ ...request.headers }),
    body: request.body,
  });
}
