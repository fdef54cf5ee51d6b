/**
 * @switchyard/dispatch - URI rewriting tests
 */

import { describe, it, expect } from "vitest";
import { MalformedTargetError } from "../src/errors.js";
import { toEndpoint } from "../src/registry.js";
import {
  endpointFromUrl,
  parseServiceTarget,
  parseTarget,
  rebaseUrl,
  rewriteRequest,
  rewriteUrl,
  withPathPrefix,
} from "../src/rewrite.js";
import type { LogicalRequest } from "../src/types.js";

const plain = toEndpoint({ host: "10.0.0.5", port: 8080, secure: false });
const secure = toEndpoint({ host: "10.0.0.5", port: 8080, secure: true });

describe("rewriteUrl", () => {
  it("should replace the service name with host and port", () => {
    expect(rewriteUrl(plain, "http://orders/items/42")).toBe("http://10.0.0.5:8080/items/42");
  });

  it("should upgrade to https for secure endpoints and add a root path", () => {
    expect(rewriteUrl(secure, "http://orders")).toBe("https://10.0.0.5:8080/");
  });

  it("should keep an https scheme for plain endpoints", () => {
    expect(rewriteUrl(plain, "https://orders/items")).toBe("https://10.0.0.5:8080/items");
  });

  it("should carry path and query over verbatim", () => {
    expect(rewriteUrl(plain, "http://orders/a%20b/../c?q=%2F&q=2#top")).toBe(
      "http://10.0.0.5:8080/a%20b/../c?q=%2F&q=2#top"
    );
  });

  it("should put a path before a bare query", () => {
    expect(rewriteUrl(plain, "http://orders?page=2")).toBe("http://10.0.0.5:8080/?page=2");
  });

  it("should bracket IPv6 hosts", () => {
    const v6 = toEndpoint({ host: "::1", port: 9000, secure: false });
    expect(rewriteUrl(v6, "http://orders/items")).toBe("http://[::1]:9000/items");
  });

  it("should reject URLs without an authority", () => {
    expect(() => rewriteUrl(plain, "orders/items")).toThrow(MalformedTargetError);
    expect(() => rewriteUrl(plain, "http:///items")).toThrow('Malformed target "http:///items": no parseable authority');
  });

  it("should reject schemes other than http and https", () => {
    expect(() => rewriteUrl(plain, "ftp://orders/items", "orders")).toThrow(
      'Malformed target "ftp://orders/items": unsupported scheme "ftp"'
    );
  });
});

describe("rewriteUrl endpoint checks", () => {
  it("should reject an endpoint without a host", () => {
    const hostless = { host: "", port: 8080, secure: false, metadata: {} };
    expect(() => rewriteUrl(hostless, "http://orders/items/42", "orders")).toThrow(
      'Malformed target "http://orders/items/42": endpoint has no host'
    );
    expect(() => rewriteUrl({ ...hostless, host: "  " }, "http://orders/items/42")).toThrow(MalformedTargetError);
  });

  it("should reject ports outside 1..65535", () => {
    for (const port of [0, 65536, 80.5, Number.NaN]) {
      const endpoint = { host: "10.0.0.5", port, secure: false, metadata: {} };
      expect(() => rewriteUrl(endpoint, "http://orders/items/42")).toThrow(
        `Malformed target "http://orders/items/42": endpoint port ${port} is not between 1 and 65535`
      );
    }
  });

  it("should check the endpoint in rewriteRequest too", () => {
    const request: LogicalRequest = { serviceName: "orders", url: "http://orders/x", method: "GET", headers: {} };
    expect(() => rewriteRequest({ host: "", port: 0, secure: false, metadata: {} }, request)).toThrow(
      MalformedTargetError
    );
  });
});

describe("parseServiceTarget", () => {
  it("should accept URLs addressed to the service in any case", () => {
    expect(parseServiceTarget("http://Orders/items", "orders").rest).toBe("/items");
  });

  it("should reject URLs addressed to another service", () => {
    expect(() => parseServiceTarget("http://payments/x", "orders")).toThrow(
      'Malformed target "http://payments/x": addressed to "payments" instead of "orders"'
    );
  });
});

describe("parseTarget", () => {
  it("should split scheme, authority and rest", () => {
    expect(parseTarget("HTTPS://orders/items?x=1")).toEqual({
      scheme: "https",
      authority: "orders",
      rest: "/items?x=1",
    });
  });

  it("should tag errors with the service name", () => {
    try {
      parseTarget("not a url", "orders");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedTargetError);
      expect(error).toMatchObject({ kind: "malformed-target", serviceName: "orders", url: "not a url" });
    }
  });
});

describe("withPathPrefix", () => {
  it("should insert the prefix before the path", () => {
    expect(withPathPrefix("http://orders/items?x=1", "/api")).toBe("http://orders/api/items?x=1");
    expect(withPathPrefix("http://orders", "/api")).toBe("http://orders/api");
  });

  it("should leave the URL untouched without a prefix", () => {
    expect(withPathPrefix("http://orders/items", "")).toBe("http://orders/items");
  });
});

describe("fixed URLs", () => {
  it("should join a base URL with the logical path and query", () => {
    expect(rebaseUrl("https://orders.example.com/api", "http://orders/items?x=1")).toBe(
      "https://orders.example.com/api/items?x=1"
    );
  });

  it("should derive an endpoint with default ports", () => {
    expect(endpointFromUrl("https://orders.example.com")).toEqual({
      host: "orders.example.com",
      port: 443,
      secure: true,
      metadata: {},
    });
    expect(endpointFromUrl("http://localhost").port).toBe(80);
  });

  it("should unbracket IPv6 hosts and keep explicit ports", () => {
    expect(endpointFromUrl("http://[::1]:9000")).toMatchObject({ host: "::1", port: 9000, secure: false });
  });

  it("should reject base URLs that do not parse", () => {
    expect(() => endpointFromUrl("http://", "orders")).toThrow(MalformedTargetError);
  });
});

describe("rewriteRequest", () => {
  it("should build a frozen physical request", () => {
    const physical = rewriteRequest(plain, {
      serviceName: "orders",
      url: "http://orders/items/42",
      method: "GET",
      headers: { accept: "application/json" },
    });

    expect(physical).toEqual({
      serviceName: "orders",
      endpoint: plain,
      url: "http://10.0.0.5:8080/items/42",
      method: "GET",
      headers: { accept: "application/json" },
      body: undefined,
    });
    expect(Object.isFrozen(physical)).toBe(true);
    expect(Object.isFrozen(physical.headers)).toBe(true);
  });
});
