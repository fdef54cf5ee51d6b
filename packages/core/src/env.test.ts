import { describe, it, expect, afterEach, vi } from "vitest";
import { getEnv, getEnvJson, getEnvMode, isDevelopment } from "./env.js";

describe("env helpers", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should treat empty values as unset", () => {
    vi.stubEnv("SWITCHYARD_TEST_VALUE", "");
    expect(getEnv("SWITCHYARD_TEST_VALUE", "fallback")).toBe("fallback");
  });

  it("should parse JSON documents", () => {
    vi.stubEnv("SWITCHYARD_TEST_JSON", '{"config":{"orders":{"readTimeoutMs":3000}}}');
    expect(getEnvJson("SWITCHYARD_TEST_JSON")).toEqual({
      config: { orders: { readTimeoutMs: 3000 } },
    });
    expect(getEnvJson("SWITCHYARD_TEST_UNSET_JSON")).toBeUndefined();
  });

  it("should reject malformed JSON", () => {
    vi.stubEnv("SWITCHYARD_TEST_JSON", "{config:");
    expect(() => getEnvJson("SWITCHYARD_TEST_JSON")).toThrow(
      /^Environment variable "SWITCHYARD_TEST_JSON" is not valid JSON: /
    );
  });

  it("should read the mode from NODE_ENV", () => {
    vi.stubEnv("NODE_ENV", "production");
    expect(getEnvMode()).toBe("production");
    expect(isDevelopment()).toBe(false);
    vi.stubEnv("NODE_ENV", "staging");
    expect(getEnvMode()).toBe("development");
    expect(isDevelopment()).toBe(true);
  });
});
