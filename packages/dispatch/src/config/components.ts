/**
 * @switchyard/dispatch - Component Registry
 * Named retry policies, error decoders and interceptors that properties
 * refer to.
 */

import { ConfigurationError } from "@switchyard/core";
import type { ServiceProperties } from "@switchyard/types";
import { createRetryPolicy } from "../resilience/retry.js";
import type {
  ErrorDecoder,
  RequestInterceptor,
  RetryPolicy,
  ServiceOptionsTier,
} from "../types.js";
import { defaultErrorDecoder } from "./defaults.js";

/**
 * @example
 * ```typescript
 * const components = new ComponentRegistry()
 *   .registerInterceptor({ name: 'auth', apply: (t) => { t.headers['authorization'] = 'Bearer test-token'; } })
 *   .registerRetryPolicy('standard', createRetryPolicy({ maxAttempts: 3 }));
 * ```
 */
export class ComponentRegistry {
  private readonly retryPolicies = new Map<string, RetryPolicy>();
  private readonly errorDecoders = new Map<string, ErrorDecoder>();
  private readonly interceptors = new Map<string, RequestInterceptor>();

  constructor() {
    this.errorDecoders.set(defaultErrorDecoder.name, defaultErrorDecoder);
  }

  registerRetryPolicy(name: string, policy: RetryPolicy): this {
    this.retryPolicies.set(name, createRetryPolicy(policy));
    return this;
  }

  registerErrorDecoder(decoder: ErrorDecoder): this {
    this.errorDecoders.set(decoder.name, decoder);
    return this;
  }

  registerInterceptor(interceptor: RequestInterceptor): this {
    this.interceptors.set(interceptor.name, interceptor);
    return this;
  }

  /**
   * Turn validated properties into a configuration tier, resolving every
   * component reference.
   *
   * @throws ConfigurationError naming every unknown component
   */
  toTier(properties: ServiceProperties, scope: string): ServiceOptionsTier {
    const problems: string[] = [];
    const tier: ServiceOptionsTier = {
      connectTimeoutMs: properties.connectTimeoutMs,
      readTimeoutMs: properties.readTimeoutMs,
      loggerLevel: properties.loggerLevel,
      decodeNotFoundAsEmpty: properties.decode404AsEmpty,
    };

    const retry = properties.retryPolicy;
    if (typeof retry === "string") {
      const policy = this.retryPolicies.get(retry);
      if (policy) {
        tier.retryPolicy = policy;
      } else {
        problems.push(`retryPolicy: unknown retry policy "${retry}"`);
      }
    } else if (retry !== undefined) {
      tier.retryPolicy = createRetryPolicy({
        maxAttempts: retry.maxAttempts,
        backoff: retry.backoff,
        initialDelayMs: retry.initialDelayMs,
        maxDelayMs: retry.maxDelayMs,
        retryOn: retry.retryOn,
      });
    }

    if (properties.errorDecoder !== undefined) {
      const decoder = this.errorDecoders.get(properties.errorDecoder);
      if (decoder) {
        tier.errorDecoder = decoder;
      } else {
        problems.push(`errorDecoder: unknown error decoder "${properties.errorDecoder}"`);
      }
    }

    if (properties.requestInterceptors !== undefined) {
      const resolved: RequestInterceptor[] = [];
      properties.requestInterceptors.forEach((name, index) => {
        const interceptor = this.interceptors.get(name);
        if (interceptor) {
          resolved.push(interceptor);
        } else {
          problems.push(`requestInterceptors.${index}: unknown interceptor "${name}"`);
        }
      });
      tier.interceptors = resolved;
    }

    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid properties for ${scope}`, problems, { scope });
    }
    return tier;
  }
}
