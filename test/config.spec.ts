import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../src";

describe("loadConfig", () => {
  it("returns nothing set for an empty environment", () => {
    expect(loadConfig({})).toEqual({});
  });

  it("reads prefixed variables", () => {
    const config = loadConfig({
      SLICESTITCH_BASE_URL: "https://example.test/query",
      SLICESTITCH_TOKEN: "test-token",
      SLICESTITCH_SECRET: "test-secret",
      SLICESTITCH_TOKEN_TTL: "90",
      SLICESTITCH_LOG: "debug",
      PATH: "/usr/bin",
    });

    expect(config).toEqual({
      baseUrl: "https://example.test/query",
      token: "test-token",
      secret: "test-secret",
      tokenTtlSeconds: 90,
      logLevel: "debug",
    });
  });

  it("treats empty values as unset", () => {
    expect(loadConfig({ SLICESTITCH_TOKEN: "" }).token).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ SLICESTITCH_TOKEN_TTL: "abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ SLICESTITCH_TOKEN_TTL: "0" })).toThrow(ConfigError);
    expect(() => loadConfig({ SLICESTITCH_LOG: "loud" })).toThrow(/^SLICESTITCH_LOG: /);
    expect(() => loadConfig({ SLICESTITCH_BASE_URL: "not a url" })).toThrow(ConfigError);
  });
});
