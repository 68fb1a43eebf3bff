import { describe, expect, it } from "vitest";
import {
  DEFAULT_INVENTORY_URL,
  DEFAULT_SSO_URL,
  loadServerConfig,
} from "../../../src/config/server-config.js";
import { ConfigurationError } from "../../../src/types/errors.js";

describe("loadServerConfig", () => {
  it("applies defaults", () => {
    const config = loadServerConfig({});

    expect(config.defaultOfflineToken).toBeUndefined();
    expect(config.sso).toEqual({ url: DEFAULT_SSO_URL, clientId: "cloud-services" });
    expect(config.inventory.url).toBe(DEFAULT_INVENTORY_URL);
    expect(config.requestTimeoutMs).toBe(30000);
    expect(config.cache).toEqual({ maxCacheSize: 1000, safetyBufferSeconds: 60 });
    expect(config.tools.allowOnlyNonDestructive).toBe(false);
    expect(config.http).toEqual({ enabled: false, host: "0.0.0.0", port: 3000 });
  });

  it("reads overrides from the environment", () => {
    const config = loadServerConfig({
      OFFLINE_TOKEN: " offline-env ",
      INVENTORY_URL: "https://inventory.test/v2/",
      REQUEST_TIMEOUT_MS: "5000",
      ENABLE_STREAMABLE_HTTP_TRANSPORT: "1",
      PORT: "8080",
    });

    expect(config.defaultOfflineToken).toBe("offline-env");
    expect(config.inventory.url).toBe("https://inventory.test/v2");
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.http).toEqual({ enabled: true, host: "0.0.0.0", port: 8080 });
  });

  it("treats a blank offline token as absent", () => {
    expect(loadServerConfig({ OFFLINE_TOKEN: "  " }).defaultOfflineToken).toBeUndefined();
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadServerConfig({ REQUEST_TIMEOUT_MS: "soon" })).toThrow(
      'Environment variable REQUEST_TIMEOUT_MS must be an integer, got "soon"',
    );
  });

  it("rejects a number with a trailing unit", () => {
    expect(() => loadServerConfig({ REQUEST_TIMEOUT_MS: "30s" })).toThrow(
      'Environment variable REQUEST_TIMEOUT_MS must be an integer, got "30s"',
    );
  });

  it("rejects a fractional cache size", () => {
    expect(() => loadServerConfig({ TOKEN_CACHE_MAX_SIZE: "2.5" })).toThrow(
      ConfigurationError,
    );
  });

  it("rejects an invalid URL", () => {
    expect(() => loadServerConfig({ SSO_URL: "not a url" })).toThrow(
      ConfigurationError,
    );
  });

  it("rejects a non-positive timeout", () => {
    expect(() => loadServerConfig({ REQUEST_TIMEOUT_MS: "0" })).toThrow(
      "Request timeout must be positive",
    );
  });
});
