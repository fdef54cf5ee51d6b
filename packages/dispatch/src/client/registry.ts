/**
 * @switchyard/dispatch - Client Registry
 * Binds service names to client contracts and their configuration.
 */

import { ConfigurationError, createLogger, type Logger } from "@switchyard/core";
import type { ServiceConfigStore } from "../config/store.js";
import type { ClientRegistration, RegistrationLookup, ServiceOptionsTier } from "../types.js";
import type { ClientContract } from "./define.js";

// ============================================================================
// NORMALISATION
// ============================================================================

const SCHEME_PREFIX = /^https?:\/\//i;

/**
 * Strip an `http://`/`https://` prefix and check the rest is usable as a
 * hostname.
 *
 * @throws ConfigurationError
 */
export function normalizeServiceName(name: string): string {
  const serviceName = name.trim().replace(SCHEME_PREFIX, "");
  if (serviceName === "") {
    throw new ConfigurationError("Service name must not be empty", [], { name });
  }
  if (serviceName.includes("/")) {
    throw new ConfigurationError(`Service name "${name}" must not contain "/"`, [], { name });
  }

  let parsed: URL | undefined;
  try {
    parsed = new URL(`http://${serviceName}`);
  } catch {
    parsed = undefined;
  }
  if (!parsed || parsed.hostname === "" || parsed.search !== "" || parsed.hash !== "" || parsed.username !== "") {
    throw new ConfigurationError(`Service name "${name}" is not a legal hostname`, [], { name });
  }
  return serviceName;
}

/**
 * Fixed base URL: `http://` is prepended when no scheme is given and a
 * trailing "/" is removed. Blank URLs mean "no fixed URL".
 *
 * @throws ConfigurationError for URLs that do not parse
 */
export function normalizeUrl(url: string | undefined): string | undefined {
  const trimmed = url?.trim() ?? "";
  if (trimmed === "") {
    return undefined;
  }

  const withScheme = trimmed.includes("://") ? trimmed : `http://${trimmed}`;
  try {
    new URL(withScheme);
  } catch {
    throw new ConfigurationError(`URL "${url}" is malformed`, [], { url });
  }
  return withScheme.replace(/\/+$/, "");
}

/**
 * Path prefix with a leading "/" and no trailing "/", or "" for none
 */
export function normalizePath(path: string | undefined): string {
  const trimmed = path?.trim() ?? "";
  if (trimmed === "" || trimmed === "/") {
    return "";
  }
  const leading = trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
  return leading.replace(/\/+$/, "");
}

// ============================================================================
// CLIENT REGISTRY
// ============================================================================

/**
 * @example
 * ```typescript
 * const clients = new ClientRegistry(store);
 * clients.registerClient('orders', ordersContract, { readTimeoutMs: 1000 });
 * clients.registerServiceConfigOverride('orders', { loggerLevel: 'BASIC' });
 *
 * const dispatcher = new Dispatcher({ registry, transport, config: store, clients });
 * ```
 */
export class ClientRegistry implements RegistrationLookup {
  private readonly registrations = new Map<string, ClientRegistration>();
  private readonly config: ServiceConfigStore;
  private readonly logger: Logger;

  constructor(config: ServiceConfigStore, options: { logger?: Logger } = {}) {
    this.config = config;
    this.logger = options.logger ?? createLogger({ name: "clients" });
  }

  /**
   * Register a client for a service. The contract's `url`, `path` and
   * `decode404` are normalised into the registration; `codeDefaults`
   * become the code tier of the service's options.
   *
   * @throws ConfigurationError for an invalid name, URL, or a duplicate
   */
  registerClient(
    serviceName: string,
    contract: ClientContract,
    codeDefaults: ServiceOptionsTier = {}
  ): ClientRegistration {
    const name = normalizeServiceName(serviceName);
    if (this.registrations.has(name)) {
      throw new ConfigurationError(`A client is already registered for service "${name}"`, [], {
        serviceName: name,
      });
    }

    const registration: ClientRegistration = Object.freeze({
      serviceName: name,
      url: normalizeUrl(contract.url),
      path: normalizePath(contract.path),
      decode404: contract.decode404 ?? false,
    });

    const tier: ServiceOptionsTier = { ...codeDefaults };
    if (tier.decodeNotFoundAsEmpty === undefined && registration.decode404) {
      tier.decodeNotFoundAsEmpty = true;
    }

    this.registrations.set(name, registration);
    this.config.setCodeDefaults(name, tier);
    this.logger.debug("Client registered", {
      service: name,
      url: registration.url,
      path: registration.path,
    });
    return registration;
  }

  /**
   * Per-service properties for a service, validated now and applied on the
   * next resolution.
   *
   * @throws ConfigurationError for invalid properties
   */
  registerServiceConfigOverride(serviceName: string, properties: unknown): void {
    const name = normalizeServiceName(serviceName);
    this.config.setServiceProperties(name, properties);
    this.logger.debug("Service properties overridden", { service: name });
  }

  lookup(serviceName: string): ClientRegistration | undefined {
    return this.registrations.get(serviceName);
  }

  serviceNames(): string[] {
    return [...this.registrations.keys()];
  }
}
