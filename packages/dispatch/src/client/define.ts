/**
 * @switchyard/dispatch - Client Contracts
 * Declarative description of a remote service's methods
 */

import { ConfigurationError } from "@switchyard/core";
import { clientRegistration, describeProblems, type, type Schema } from "@switchyard/types";
import type { HeaderMap, HttpMethod } from "../types.js";

// ============================================================================
// TYPES
// ============================================================================

/**
 * One remote method. `path` may hold `{param}` placeholders; `response`
 * validates and types the decoded JSON body.
 */
export interface MethodDefinition<TResponse = unknown> {
  method: HttpMethod;
  path: string;
  headers?: HeaderMap;
  response?: Schema<TResponse>;
}

export type MethodDefinitions = Record<string, MethodDefinition<unknown>>;

/**
 * A named client contract. `url` pins the service to a fixed base URL;
 * `path` prefixes every method path.
 */
export interface ClientContract<TMethods extends MethodDefinitions = MethodDefinitions> {
  readonly name: string;
  readonly url?: string | undefined;
  readonly path?: string | undefined;
  /** Decode 404 responses as empty instead of failing */
  readonly decode404?: boolean | undefined;
  readonly methods: Readonly<TMethods>;
}

const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "PATCH", "DELETE", "HEAD", "OPTIONS"];

// ============================================================================
// CONTRACT DEFINITION
// ============================================================================

/**
 * Define a client contract
 *
 * @example
 * ```typescript
 * const ordersClient = defineClient({
 *   name: 'orders',
 *   path: '/api',
 *   decode404: true,
 *   methods: {
 *     getOrder: { method: 'GET', path: '/orders/{id}', response: type({ id: 'string', total: 'number' }) },
 *     cancelOrder: { method: 'POST', path: '/orders/{id}/cancel' },
 *   },
 * });
 * ```
 */
export function defineClient<TMethods extends MethodDefinitions>(
  contract: ClientContract<TMethods>
): ClientContract<TMethods> {
  validateClientContract(contract);

  for (const definition of Object.values(contract.methods)) {
    Object.freeze(definition);
  }

  return Object.freeze({ ...contract, methods: Object.freeze({ ...contract.methods }) });
}

/**
 * @throws ConfigurationError listing every problem of the contract
 */
function validateClientContract(contract: ClientContract<MethodDefinitions>): void {
  const problems: string[] = [];

  const result = clientRegistration({
    name: contract.name,
    ...(contract.url !== undefined ? { url: contract.url } : {}),
    ...(contract.path !== undefined ? { path: contract.path } : {}),
    ...(contract.decode404 !== undefined ? { decode404: contract.decode404 } : {}),
  });
  if (result instanceof type.errors) {
    problems.push(...describeProblems(result));
  }

  for (const [name, definition] of Object.entries(contract.methods)) {
    if (!HTTP_METHODS.includes(definition.method)) {
      problems.push(`methods.${name}.method: unsupported HTTP method "${definition.method}"`);
    }
    if (!definition.path.startsWith("/")) {
      problems.push(`methods.${name}.path: must start with "/"`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid client contract "${contract.name}"`, problems);
  }
}
