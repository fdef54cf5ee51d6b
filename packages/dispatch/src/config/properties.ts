/**
 * @switchyard/dispatch - Client Properties
 * Validation of externally supplied property documents.
 */

import { ConfigurationError, getEnvJson } from "@switchyard/core";
import {
  clientProperties,
  describeProblems,
  serviceProperties,
  type,
  type ClientProperties,
  type ServiceProperties,
} from "@switchyard/types";
import { CLIENT_CONFIG_ENV } from "./defaults.js";

/**
 * @throws ConfigurationError listing every invalid field
 */
export function parseServiceProperties(input: unknown, scope: string): ServiceProperties {
  const result = serviceProperties(input);
  if (result instanceof type.errors) {
    throw new ConfigurationError(`Invalid properties for ${scope}`, describeProblems(result), { scope });
  }
  return result;
}

/**
 * @throws ConfigurationError listing every invalid field
 */
export function parseClientProperties(input: unknown): ClientProperties {
  const result = clientProperties(input);
  if (result instanceof type.errors) {
    throw new ConfigurationError("Invalid client properties", describeProblems(result));
  }
  return result;
}

/**
 * Read the client properties document from the environment (JSON).
 * Returns undefined when the variable is unset.
 *
 * @example
 * ```typescript
 * // SWITCHYARD_CLIENT_CONFIG='{"config":{"default":{"readTimeoutMs":2000}}}'
 * const properties = loadClientPropertiesFromEnv();
 * ```
 */
export function loadClientPropertiesFromEnv(
  key: string = CLIENT_CONFIG_ENV
): ClientProperties | undefined {
  let raw: unknown;
  try {
    raw = getEnvJson(key);
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error), [], { key });
  }
  return raw === undefined ? undefined : parseClientProperties(raw);
}
