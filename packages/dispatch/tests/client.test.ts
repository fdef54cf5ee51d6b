/**
 * @switchyard/dispatch - Client contract, registry and factory tests
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError, Logger } from "@switchyard/core";
import { type } from "@switchyard/types";
import { ClientRegistry, normalizePath, normalizeServiceName, normalizeUrl } from "../src/client/registry.js";
import { createClient, encodeQuery, expandPath } from "../src/client/create.js";
import { defineClient } from "../src/client/define.js";
import { ServiceConfigStore } from "../src/config/store.js";
import { Dispatcher } from "../src/dispatcher.js";
import { MalformedTargetError, ResponseDecodeError } from "../src/errors.js";
import { StaticEndpointRegistry } from "../src/registry.js";
import {
  EMPTY_RESPONSE,
  type DispatchHandler,
  type DispatchOptions,
  type DispatchResponse,
  type LogicalRequest,
  type PhysicalRequest,
  type RawResponse,
  type Transport,
} from "../src/types.js";

const silent = new Logger({ level: "SILENT", transports: [] });

const order = type({ id: "string", total: "number" });

const ordersClient = defineClient({
  name: "orders",
  path: "/api",
  decode404: true,
  methods: {
    getOrder: { method: "GET", path: "/orders/{id}", response: order },
    listOrders: { method: "GET", path: "/orders" },
    createOrder: { method: "POST", path: "/orders", headers: { "x-source": "checkout" } },
  },
});

function reply(response: Partial<DispatchResponse> = {}) {
  const calls: Array<{ serviceName: string; request: LogicalRequest; options: DispatchOptions | undefined }> = [];
  const handler: DispatchHandler = {
    dispatch: async (serviceName, request, options) => {
      calls.push({ serviceName, request, options });
      return { status: 200, headers: {}, body: new Uint8Array(0), empty: false, ...response };
    },
  };
  return { handler, calls };
}

function jsonBody(value: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}

// ============================================================================
// CONTRACTS
// ============================================================================

describe("defineClient", () => {
  it("should freeze the contract and its methods", () => {
    expect(Object.isFrozen(ordersClient)).toBe(true);
    expect(Object.isFrozen(ordersClient.methods)).toBe(true);
    expect(Object.isFrozen(ordersClient.methods.getOrder)).toBe(true);
  });

  it("should list every problem of an invalid contract", () => {
    try {
      defineClient({
        name: "",
        methods: { broken: { method: "GET", path: "orders" } },
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe('Invalid client contract ""');
        expect(error.problems).toHaveLength(2);
        expect(error.problems[0]).toMatch(/^name: /);
        expect(error.problems[1]).toBe('methods.broken.path: must start with "/"');
      }
    }
  });
});

// ============================================================================
// REGISTRY
// ============================================================================

describe("client name normalisation", () => {
  it("should strip http schemes from service names", () => {
    expect(normalizeServiceName("http://orders")).toBe("orders");
    expect(normalizeServiceName(" HTTPS://orders-v2 ")).toBe("orders-v2");
  });

  it("should reject names that are not hostnames", () => {
    expect(() => normalizeServiceName("")).toThrow("Service name must not be empty");
    expect(() => normalizeServiceName("orders/api")).toThrow('Service name "orders/api" must not contain "/"');
    expect(() => normalizeServiceName("orders?x=1")).toThrow('Service name "orders?x=1" is not a legal hostname');
    expect(() => normalizeServiceName("ord ers")).toThrow(ConfigurationError);
  });

  it("should normalise fixed URLs", () => {
    expect(normalizeUrl(undefined)).toBeUndefined();
    expect(normalizeUrl("  ")).toBeUndefined();
    expect(normalizeUrl("orders.example.com/")).toBe("http://orders.example.com");
    expect(normalizeUrl("https://orders.example.com/api/")).toBe("https://orders.example.com/api");
    expect(() => normalizeUrl("http://")).toThrow('URL "http://" is malformed');
  });

  it("should normalise path prefixes", () => {
    expect(normalizePath(undefined)).toBe("");
    expect(normalizePath("/")).toBe("");
    expect(normalizePath("api/v1/")).toBe("/api/v1");
  });
});

describe("ClientRegistry", () => {
  it("should register a client and its code defaults", () => {
    const store = new ServiceConfigStore({ logger: silent });
    const clients = new ClientRegistry(store, { logger: silent });

    const registration = clients.registerClient("http://orders", ordersClient, { readTimeoutMs: 1500 });

    expect(registration).toEqual({ serviceName: "orders", url: undefined, path: "/api", decode404: true });
    expect(clients.lookup("orders")).toBe(registration);
    expect(store.resolve("orders").readTimeoutMs).toBe(1500);
    expect(store.resolve("orders").decodeNotFoundAsEmpty).toBe(true);
  });

  it("should keep an explicit decodeNotFoundAsEmpty default", () => {
    const store = new ServiceConfigStore({ logger: silent });
    const clients = new ClientRegistry(store, { logger: silent });

    clients.registerClient("orders", ordersClient, { decodeNotFoundAsEmpty: false });

    expect(store.resolve("orders").decodeNotFoundAsEmpty).toBe(false);
  });

  it("should reject a second client for the same service", () => {
    const clients = new ClientRegistry(new ServiceConfigStore({ logger: silent }), { logger: silent });
    clients.registerClient("orders", ordersClient);

    expect(() => clients.registerClient("http://orders", ordersClient)).toThrow(
      'A client is already registered for service "orders"'
    );
    expect(clients.serviceNames()).toEqual(["orders"]);
  });

  it("should apply service overrides through the store", () => {
    const store = new ServiceConfigStore({ logger: silent });
    const clients = new ClientRegistry(store, { logger: silent });
    clients.registerClient("orders", ordersClient, { readTimeoutMs: 1500 });

    clients.registerServiceConfigOverride("orders", { readTimeoutMs: 3000 });

    expect(store.resolve("orders").readTimeoutMs).toBe(3000);
  });
});

// ============================================================================
// FACTORY
// ============================================================================

describe("request building", () => {
  it("should expand and encode path parameters", () => {
    expect(expandPath("/orders/{id}/lines/{line}", { id: "a b", line: 3 })).toBe("/orders/a%20b/lines/3");
  });

  it("should reject missing path parameters", () => {
    expect(() => expandPath("/orders/{id}", {}, "orders")).toThrow(MalformedTargetError);
    expect(() => expandPath("/orders/{id}/{line}")).toThrow(
      'Malformed target "/orders/{id}/{line}": missing path parameters "id", "line"'
    );
  });

  it("should encode query parameters and repeat arrays", () => {
    expect(encodeQuery({ status: ["open", "paid"], page: 2, q: undefined, tag: "a&b" })).toBe(
      "?status=open&status=paid&page=2&tag=a%26b"
    );
    expect(encodeQuery({})).toBe("");
  });
});

describe("createClient", () => {
  it("should dispatch a logical request for the method", async () => {
    const { handler, calls } = reply({ body: jsonBody({ id: "42", total: 9.5 }) });
    const client = createClient(ordersClient, handler);
    const signal = new AbortController().signal;

    const result = await client.getOrder({ params: { id: "42" }, query: { expand: "lines" }, signal });

    expect(result).toEqual({ id: "42", total: 9.5 });
    expect(calls[0]?.serviceName).toBe("orders");
    expect(calls[0]?.request).toEqual({
      serviceName: "orders",
      url: "http://orders/orders/42?expand=lines",
      method: "GET",
      headers: { accept: "application/json" },
      body: undefined,
      connectTimeoutMs: undefined,
      readTimeoutMs: undefined,
    });
    expect(calls[0]?.options?.signal).toBe(signal);
  });

  it("should encode JSON bodies with definition and call headers", async () => {
    const { handler, calls } = reply();
    const client = createClient(ordersClient, handler);

    await client.createOrder({ body: { qty: 2 }, headers: { "x-request-id": "req-1" }, readTimeoutMs: 500 });

    const sent = calls[0]?.request;
    expect(sent?.headers).toEqual({
      accept: "application/json",
      "x-source": "checkout",
      "content-type": "application/json",
      "x-request-id": "req-1",
    });
    expect(new TextDecoder().decode(sent?.body)).toBe('{"qty":2}');
    expect(sent?.readTimeoutMs).toBe(500);
  });

  it("should resolve empty responses to undefined", async () => {
    const { handler } = reply(EMPTY_RESPONSE);
    const client = createClient(ordersClient, handler);

    await expect(client.getOrder({ params: { id: "404" } })).resolves.toBeUndefined();
    await expect(createClient(ordersClient, reply().handler).listOrders()).resolves.toBeUndefined();
  });

  it("should reject bodies that do not match the response schema", async () => {
    const { handler } = reply({ body: jsonBody({ id: 42 }) });
    const client = createClient(ordersClient, handler);

    const error = await client.getOrder({ params: { id: "42" } }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ResponseDecodeError);
    expect(error).toMatchObject({ message: "Could not decode response from orders", code: "DECODE_ERROR" });
  });

  it("should reject bodies that are not JSON", async () => {
    const { handler } = reply({ body: new TextEncoder().encode("<html>") });

    await expect(createClient(ordersClient, handler).listOrders()).rejects.toThrow(ResponseDecodeError);
  });

  it("should call through a dispatcher with the registered prefix", async () => {
    const urls: string[] = [];
    const transport: Transport = {
      name: "recording",
      execute: async (request: PhysicalRequest): Promise<RawResponse> => {
        urls.push(request.url);
        return { status: 200, headers: {}, body: jsonBody([{ id: "1", total: 3 }]) };
      },
    };
    const store = new ServiceConfigStore({ logger: silent });
    const clients = new ClientRegistry(store, { logger: silent });
    clients.registerClient("orders", ordersClient);
    const dispatcher = new Dispatcher({
      registry: new StaticEndpointRegistry({ orders: [{ host: "10.0.0.5", port: 8080, secure: false }] }),
      transport,
      config: store,
      clients,
      logger: silent,
    });

    const result = await createClient(ordersClient, dispatcher).listOrders({ query: { page: 1 } });

    expect(result).toEqual([{ id: "1", total: 3 }]);
    expect(urls).toEqual(["http://10.0.0.5:8080/api/orders?page=1"]);
  });
});
