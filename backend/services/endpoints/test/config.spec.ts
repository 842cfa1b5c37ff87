// backend/services/endpoints/test/config.spec.ts
import { describe, it, expect } from "vitest";
import { loadConfig, parseStoreUrl } from "../src/config";

describe("parseStoreUrl", () => {
  it.each([
    ["redis://localhost:6379/0", "redis://localhost:6379", 0],
    ["rediss://cache.internal:6380/4", "rediss://cache.internal:6380", 4],
    ["valkey://user:pw@cache:6380/3", "redis://user:pw@cache:6380", 3],
    ["valkeys://:test-secret@cache/1", "rediss://:test-secret@cache", 1],
  ])("%s → %s db %i", (raw, url, database) => {
    expect(parseStoreUrl(raw)).toEqual({ url, database });
  });

  it.each([
    ["not a url", 'parse VALKEY_URL: invalid URL "not a url"'],
    ["http://localhost/0", 'parse VALKEY_URL: unsupported scheme "http:"'],
    ["redis:///0", 'parse VALKEY_URL: missing host in "redis:///0"'],
    ["redis://localhost:6379", 'parse DB from VALKEY_URL: "" is not a database index'],
    ["redis://localhost/abc", 'parse DB from VALKEY_URL: "abc" is not a database index'],
  ])("rejects %s", (raw, message) => {
    expect(() => parseStoreUrl(raw)).toThrow(message);
  });
});

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ VALKEY_URL: "redis://localhost:6379/2" })).toEqual({
      addr: "0.0.0.0",
      port: 8000,
      store: { url: "redis://localhost:6379", database: 2 },
    });
  });

  it("reads address and port", () => {
    const cfg = loadConfig({
      VALKEY_URL: "redis://localhost:6379/0",
      ENDPOINTS_ADDR: "127.0.0.1",
      ENDPOINTS_PORT: "9090",
    });
    expect(cfg.addr).toBe("127.0.0.1");
    expect(cfg.port).toBe(9090);
  });

  it("requires VALKEY_URL", () => {
    expect(() => loadConfig({})).toThrow("Missing required env var: VALKEY_URL");
  });

  it("rejects a non-numeric port", () => {
    expect(() =>
      loadConfig({ VALKEY_URL: "redis://localhost:6379/0", ENDPOINTS_PORT: "http" })
    ).toThrow('Invalid number for env var ENDPOINTS_PORT: "http"');
  });

  it("rejects a port out of range", () => {
    expect(() =>
      loadConfig({ VALKEY_URL: "redis://localhost:6379/0", ENDPOINTS_PORT: "70000" })
    ).toThrow('Invalid port for env var ENDPOINTS_PORT: "70000"');
  });
});
