/**
 * @switchyard/dispatch - Error classification tests
 */

import { describe, it, expect } from "vitest";
import { SwitchyardError } from "@switchyard/core";
import {
  CanceledError,
  DispatchError,
  HttpStatusError,
  IoFailureError,
  NoInstancesAvailableError,
  UnexpectedDispatchError,
  classifyError,
  findIoFailure,
  isIoShaped,
} from "../src/errors.js";

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("dispatch errors", () => {
  it("should carry kind, code and status", () => {
    const error = new NoInstancesAvailableError("orders");

    expect(error).toBeInstanceOf(DispatchError);
    expect(error).toBeInstanceOf(SwitchyardError);
    expect(error.toJSON()).toEqual({
      name: "NoInstancesAvailableError",
      message: "No instances available for orders",
      code: "NO_INSTANCES_AVAILABLE",
      statusCode: 503,
      details: { kind: "no-instances", serviceName: "orders" },
    });
  });

  it("should expose the body of a failed response", () => {
    const error = new HttpStatusError("orders", "POST", "http://10.0.0.5:8080/orders", {
      status: 409,
      headers: {},
      body: new TextEncoder().encode("duplicate order"),
    });

    expect(error.message).toBe("POST http://10.0.0.5:8080/orders failed with status 409");
    expect(error.statusCode).toBe(409);
    expect(error.bodyText()).toBe("duplicate order");
  });
});

describe("isIoShaped", () => {
  it("should recognise system and undici error codes", () => {
    expect(isIoShaped(withCode("refused", "ECONNREFUSED"))).toBe(true);
    expect(isIoShaped(withCode("closed", "UND_ERR_SOCKET"))).toBe(true);
    expect(isIoShaped(withCode("denied", "EACCES"))).toBe(false);
    expect(isIoShaped("ECONNREFUSED")).toBe(false);
  });
});

describe("findIoFailure", () => {
  it("should return an io failure from the chain as is", () => {
    const io = new IoFailureError("reset", { networkCode: "ECONNRESET" });
    expect(findIoFailure(new Error("outer", { cause: io }))).toBe(io);
  });

  it("should wrap the innermost io-shaped link", () => {
    const inner = withCode("getaddrinfo ENOTFOUND orders", "ENOTFOUND");
    const middle = Object.assign(new Error("lookup failed", { cause: inner }), { code: "EAI_AGAIN" });

    const found = findIoFailure(new Error("fetch failed", { cause: middle }), "orders");

    expect(found?.message).toBe("getaddrinfo ENOTFOUND orders");
    expect(found?.networkCode).toBe("ENOTFOUND");
    expect(found?.cause).toBe(inner);
    expect(found?.serviceName).toBe("orders");
  });

  it("should return undefined without an io-shaped link", () => {
    expect(findIoFailure(new Error("outer", { cause: new Error("inner") }))).toBeUndefined();
  });
});

describe("classifyError", () => {
  it("should pass dispatch errors through", () => {
    const error = new NoInstancesAvailableError("orders");
    expect(classifyError(error, "orders")).toBe(error);
  });

  it("should prefer cancellation when the signal is aborted", () => {
    const controller = new AbortController();
    controller.abort();
    expect(classifyError(withCode("reset", "ECONNRESET"), "orders", controller.signal)).toBeInstanceOf(
      CanceledError
    );
  });

  it("should wrap anything else as unexpected", () => {
    const error = classifyError("boom", "orders");
    expect(error).toBeInstanceOf(UnexpectedDispatchError);
    expect(error.message).toBe("Unexpected failure calling orders: boom");
    expect(error.cause).toBe("boom");
  });
});
