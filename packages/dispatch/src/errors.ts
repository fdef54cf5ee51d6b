/**
 * @switchyard/dispatch - Errors
 * Classified dispatch failures. Every failure a caller sees carries a `kind`.
 */

import { SwitchyardError, causeChain } from "@switchyard/core";
import type { DispatchErrorKind, HeaderMap, HttpMethod } from "./types.js";

/**
 * Base dispatch error
 */
export class DispatchError extends SwitchyardError {
  public readonly kind: DispatchErrorKind;
  public readonly serviceName: string | undefined;

  constructor(
    message: string,
    code: string,
    statusCode: number,
    kind: DispatchErrorKind,
    options?: {
      serviceName?: string | undefined;
      cause?: unknown;
      details?: Record<string, unknown>;
    }
  ) {
    super(
      message,
      code,
      statusCode,
      { ...options?.details, kind, ...(options?.serviceName ? { serviceName: options.serviceName } : {}) },
      { cause: options?.cause }
    );
    this.name = "DispatchError";
    this.kind = kind;
    this.serviceName = options?.serviceName;
  }
}

/**
 * The registry returned no endpoints for the service
 */
export class NoInstancesAvailableError extends DispatchError {
  constructor(serviceName: string) {
    super(`No instances available for ${serviceName}`, "NO_INSTANCES_AVAILABLE", 503, "no-instances", {
      serviceName,
    });
    this.name = "NoInstancesAvailableError";
  }
}

/**
 * A selection strategy was handed an empty candidate list
 */
export class NoEndpointsAvailableError extends DispatchError {
  constructor(serviceName: string) {
    super(`No endpoints to choose from for ${serviceName}`, "NO_ENDPOINTS_AVAILABLE", 503, "no-instances", {
      serviceName,
    });
    this.name = "NoEndpointsAvailableError";
  }
}

/**
 * The logical URL cannot be turned into a physical one
 */
export class MalformedTargetError extends DispatchError {
  public readonly url: string;

  constructor(url: string, reason: string, serviceName?: string) {
    super(`Malformed target "${url}": ${reason}`, "MALFORMED_TARGET", 500, "malformed-target", {
      serviceName,
      details: { url, reason },
    });
    this.name = "MalformedTargetError";
    this.url = url;
  }
}

/**
 * Network or transport level failure
 */
export class IoFailureError extends DispatchError {
  /** System error code of the underlying failure, e.g. `ECONNREFUSED` */
  public readonly networkCode: string | undefined;

  constructor(
    message: string,
    options?: { serviceName?: string | undefined; cause?: unknown; networkCode?: string | undefined }
  ) {
    super(message, "IO_FAILURE", 503, "io-failure", {
      serviceName: options?.serviceName,
      cause: options?.cause,
      details: options?.networkCode ? { networkCode: options.networkCode } : undefined,
    });
    this.name = "IoFailureError";
    this.networkCode = options?.networkCode;
  }
}

/**
 * Any other failure from interceptors, the registry or the transport
 */
export class UnexpectedDispatchError extends DispatchError {
  constructor(serviceName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unexpected failure calling ${serviceName}: ${reason}`, "UNEXPECTED", 500, "unexpected", {
      serviceName,
      cause,
    });
    this.name = "UnexpectedDispatchError";
  }
}

/**
 * Non-2xx response, as produced by the default error decoder
 */
export class HttpStatusError extends DispatchError {
  public readonly status: number;
  public readonly headers: Readonly<HeaderMap>;
  public readonly body: Uint8Array;

  constructor(
    serviceName: string,
    method: HttpMethod,
    url: string,
    response: { status: number; headers: Readonly<HeaderMap>; body: Uint8Array }
  ) {
    super(
      `${method} ${url} failed with status ${response.status}`,
      "HTTP_STATUS",
      response.status >= 400 ? response.status : 502,
      "unexpected",
      { serviceName, details: { status: response.status, method, url } }
    );
    this.name = "HttpStatusError";
    this.status = response.status;
    this.headers = response.headers;
    this.body = response.body;
  }

  /** Response body decoded as UTF-8 */
  bodyText(): string {
    return new TextDecoder().decode(this.body);
  }
}

/**
 * The caller canceled the call
 */
export class CanceledError extends DispatchError {
  constructor(serviceName: string, cause?: unknown) {
    super(`Call to ${serviceName} was canceled`, "CANCELED", 499, "canceled", { serviceName, cause });
    this.name = "CanceledError";
  }
}

/**
 * A 2xx response body did not match what the client contract expects
 */
export class ResponseDecodeError extends SwitchyardError {
  constructor(serviceName: string, problems: string[], cause?: unknown) {
    super(`Could not decode response from ${serviceName}`, "DECODE_ERROR", 502, { serviceName, problems }, { cause });
    this.name = "ResponseDecodeError";
  }
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

const IO_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ESOCKETTIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
]);

function errorCode(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "code" in value) {
    const code = value.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Whether a value looks like a network-level failure: a known system error
 * code or an undici socket error.
 */
export function isIoShaped(value: unknown): boolean {
  if (value instanceof IoFailureError) return true;
  const code = errorCode(value);
  return code !== undefined && (IO_ERROR_CODES.has(code) || code.startsWith("UND_ERR_"));
}

/**
 * Find the network failure inside an error's cause chain. An
 * `IoFailureError` is returned as is; otherwise the innermost I/O-shaped
 * link becomes a new `IoFailureError` with the same message.
 */
export function findIoFailure(error: unknown, serviceName?: string): IoFailureError | undefined {
  let innermost: unknown;
  for (const link of causeChain(error)) {
    if (link instanceof IoFailureError) return link;
    if (isIoShaped(link)) innermost = link;
  }
  if (innermost === undefined) return undefined;
  return new IoFailureError(innermost instanceof Error ? innermost.message : String(innermost), {
    serviceName,
    cause: innermost,
    networkCode: errorCode(innermost),
  });
}

/**
 * Map any thrown value to the dispatch error the caller sees. Dispatch
 * errors pass through; a canceled signal wins over the remaining rules.
 */
export function classifyError(
  error: unknown,
  serviceName: string,
  signal?: AbortSignal
): DispatchError {
  if (error instanceof DispatchError) return error;
  if (signal?.aborted) return new CanceledError(serviceName, error);
  return findIoFailure(error, serviceName) ?? new UnexpectedDispatchError(serviceName, error);
}
