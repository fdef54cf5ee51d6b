/**
 * @switchyard/dispatch - Default Service Options
 */

import { HttpStatusError } from "../errors.js";
import type { ErrorDecodeContext, ErrorDecoder, ServiceOptions } from "../types.js";

/**
 * Maps every non-2xx response to an {@link HttpStatusError}
 */
export const defaultErrorDecoder: ErrorDecoder = Object.freeze({
  name: "default",
  decode: ({ serviceName, request, response }: ErrorDecodeContext): Error =>
    new HttpStatusError(serviceName, request.method, request.url, response),
});

/**
 * Options a service gets when no tier sets a field
 */
export const DEFAULT_SERVICE_OPTIONS: ServiceOptions = Object.freeze({
  connectTimeoutMs: 10_000,
  readTimeoutMs: 60_000,
  loggerLevel: "NONE",
  retryPolicy: undefined,
  errorDecoder: defaultErrorDecoder,
  interceptors: Object.freeze([]),
  decodeNotFoundAsEmpty: false,
});

/** Key of the global tier inside a client properties document */
export const DEFAULT_CONFIG_KEY = "default";

/** Environment variable holding the client properties document as JSON */
export const CLIENT_CONFIG_ENV = "SWITCHYARD_CLIENT_CONFIG";
