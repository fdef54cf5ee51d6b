/**
 * @switchyard/dispatch - Fetch Transport
 * Executes physical requests with the Fetch API
 */

import { IoFailureError } from "../errors.js";
import { withTimeout } from "../resilience/timeout.js";
import type { HeaderMap, PhysicalRequest, RawResponse, Transport, TransportOptions } from "../types.js";

// ============================================================================
// FETCH TRANSPORT
// ============================================================================

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Options for creating a fetch transport.
 */
export interface FetchTransportOptions {
  /** Fetch function (for testing or custom implementations) */
  fetch?: FetchFn;
  /** Headers added to every request; request headers win */
  headers?: HeaderMap;
}

function toHeaderMap(headers: Headers): HeaderMap {
  const map: HeaderMap = {};
  headers.forEach((value, key) => {
    map[key] = value;
  });
  return map;
}

/**
 * Transport over `fetch`. The whole exchange, including reading the body,
 * must finish within `connectTimeoutMs + readTimeoutMs`; a missed deadline
 * rejects with an `IoFailureError` carrying `ETIMEDOUT`. A caller abort
 * rejects with the abort reason. Other fetch failures reject unchanged.
 */
export class FetchTransport implements Transport {
  readonly name = "fetch";
  private readonly fetchFn: FetchFn;
  private readonly headers: HeaderMap;

  constructor(options: FetchTransportOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.headers = options.headers ?? {};
  }

  async execute(request: PhysicalRequest, options: TransportOptions): Promise<RawResponse> {
    const controller = new AbortController();
    const callerSignal = options.signal;
    const onAbort = (): void => controller.abort(callerSignal?.reason);

    if (callerSignal?.aborted) {
      controller.abort(callerSignal.reason);
    } else {
      callerSignal?.addEventListener("abort", onAbort, { once: true });
    }

    const exchange = async (): Promise<RawResponse> => {
      const init: RequestInit = {
        method: request.method,
        headers: { ...this.headers, ...request.headers },
        signal: controller.signal,
      };
      if (request.body !== undefined) {
        init.body = request.body;
      }

      const response = await this.fetchFn(request.url, init);
      const body = new Uint8Array(await response.arrayBuffer());
      return {
        status: response.status,
        headers: toHeaderMap(response.headers),
        body,
      };
    };

    const deadline = options.connectTimeoutMs + options.readTimeoutMs;
    const run =
      deadline > 0
        ? withTimeout(
            exchange,
            deadline,
            () =>
              new IoFailureError(`${request.method} ${request.url} timed out after ${deadline}ms`, {
                serviceName: request.serviceName,
                networkCode: "ETIMEDOUT",
              })
          )
        : exchange;

    try {
      return await run();
    } finally {
      callerSignal?.removeEventListener("abort", onAbort);
      // Cancels a fetch still running past its deadline
      controller.abort();
    }
  }
}

/**
 * Create a fetch transport.
 *
 * @example
 * ```typescript
 * const transport = createFetchTransport({ headers: { 'user-agent': 'orders-client' } });
 * ```
 */
export function createFetchTransport(options?: FetchTransportOptions): FetchTransport {
  return new FetchTransport(options);
}
