/**
 * @switchyard/dispatch - Service Configuration Store
 * Three-tier, per-service option resolution with a frozen cache.
 */

import { createLogger, type Logger } from "@switchyard/core";
import type { ClientProperties, ServiceProperties } from "@switchyard/types";
import type { ServiceOptions, ServiceOptionsTier } from "../types.js";
import { ComponentRegistry } from "./components.js";
import { DEFAULT_CONFIG_KEY } from "./defaults.js";
import { resolveServiceOptions } from "./merge.js";
import { loadClientPropertiesFromEnv, parseServiceProperties } from "./properties.js";

export interface ServiceConfigStoreOptions {
  /** Properties over code defaults (default: true) */
  defaultToProperties?: boolean;
  /** Global tier, applied to every service */
  globalProperties?: unknown;
  /** Per-service tiers */
  serviceProperties?: Record<string, unknown>;
  /** Components the properties refer to by name */
  components?: ComponentRegistry;
  logger?: Logger;
}

const EMPTY_TIER: ServiceOptionsTier = Object.freeze({});

/**
 * Resolves and caches {@link ServiceOptions} per service name.
 *
 * Properties are validated and their component references resolved when
 * they are set, so `resolve` itself does not fail. Setting code defaults or
 * properties for a service evicts that service's cached entry only.
 *
 * @example
 * ```typescript
 * const store = new ServiceConfigStore({
 *   globalProperties: { readTimeoutMs: 2000 },
 *   serviceProperties: { orders: { readTimeoutMs: 3000 } },
 * });
 * store.resolve('orders').readTimeoutMs; // 3000
 * ```
 */
export class ServiceConfigStore {
  readonly defaultToProperties: boolean;
  readonly components: ComponentRegistry;
  private readonly globalTier: ServiceOptionsTier;
  private readonly codeDefaults = new Map<string, ServiceOptionsTier>();
  private readonly serviceTiers = new Map<string, ServiceOptionsTier>();
  private readonly cache = new Map<string, ServiceOptions>();
  private readonly logger: Logger;

  constructor(options: ServiceConfigStoreOptions = {}) {
    this.defaultToProperties = options.defaultToProperties ?? true;
    this.components = options.components ?? new ComponentRegistry();
    this.logger = options.logger ?? createLogger({ name: "config" });
    this.globalTier =
      options.globalProperties === undefined
        ? EMPTY_TIER
        : this.toTier(parseServiceProperties(options.globalProperties, "global properties"), "global properties");

    for (const [serviceName, properties] of Object.entries(options.serviceProperties ?? {})) {
      this.setServiceProperties(serviceName, properties);
    }
  }

  /**
   * Build a store from a client properties document. `config[defaultConfig]`
   * becomes the global tier; every other key names a service.
   */
  static fromProperties(
    properties: ClientProperties,
    options: Pick<ServiceConfigStoreOptions, "components" | "logger"> = {}
  ): ServiceConfigStore {
    const defaultKey = properties.defaultConfig ?? DEFAULT_CONFIG_KEY;
    const serviceProperties: Record<string, ServiceProperties> = {};
    let globalProperties: ServiceProperties | undefined;

    for (const [key, value] of Object.entries(properties.config ?? {})) {
      if (key === defaultKey) {
        globalProperties = value;
      } else {
        serviceProperties[key] = value;
      }
    }

    const storeOptions: ServiceConfigStoreOptions = { ...options, serviceProperties };
    if (properties.defaultToProperties !== undefined) {
      storeOptions.defaultToProperties = properties.defaultToProperties;
    }
    if (globalProperties !== undefined) {
      storeOptions.globalProperties = globalProperties;
    }
    return new ServiceConfigStore(storeOptions);
  }

  /**
   * Build a store from the client properties document in the environment,
   * or an empty store when it is unset.
   */
  static fromEnv(
    options: Pick<ServiceConfigStoreOptions, "components" | "logger"> = {},
    key?: string
  ): ServiceConfigStore {
    const properties = loadClientPropertiesFromEnv(key);
    return properties ? ServiceConfigStore.fromProperties(properties, options) : new ServiceConfigStore(options);
  }

  /**
   * Resolved options for a service. Repeated calls return the same frozen
   * object until the service is reconfigured.
   */
  resolve(serviceName: string): ServiceOptions {
    const cached = this.cache.get(serviceName);
    if (cached) {
      return cached;
    }

    const resolved = resolveServiceOptions(
      this.codeDefaults.get(serviceName) ?? EMPTY_TIER,
      this.globalTier,
      this.serviceTiers.get(serviceName) ?? EMPTY_TIER,
      this.defaultToProperties
    );
    this.cache.set(serviceName, resolved);
    this.logger.debug("Service options resolved", {
      service: serviceName,
      connectTimeoutMs: resolved.connectTimeoutMs,
      readTimeoutMs: resolved.readTimeoutMs,
      loggerLevel: resolved.loggerLevel,
      interceptors: resolved.interceptors.map((i) => i.name),
    });
    return resolved;
  }

  /** Code-level defaults for a service, as given at client registration */
  setCodeDefaults(serviceName: string, defaults: ServiceOptionsTier): void {
    this.codeDefaults.set(serviceName, Object.freeze({ ...defaults }));
    this.invalidate(serviceName);
  }

  /**
   * Per-service properties; replaces any earlier properties for the service.
   *
   * @throws ConfigurationError for invalid properties or unknown components
   */
  setServiceProperties(serviceName: string, properties: unknown): void {
    const scope = `service "${serviceName}"`;
    const tier = this.toTier(parseServiceProperties(properties, scope), scope);
    this.serviceTiers.set(serviceName, tier);
    this.invalidate(serviceName);
  }

  invalidate(serviceName: string): void {
    this.cache.delete(serviceName);
  }

  isCached(serviceName: string): boolean {
    return this.cache.has(serviceName);
  }

  private toTier(properties: ServiceProperties, scope: string): ServiceOptionsTier {
    return Object.freeze(this.components.toTier(properties, scope));
  }
}
