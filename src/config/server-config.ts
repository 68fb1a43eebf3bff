import { ConfigurationError } from "../types/errors.js";
import type { ServerConfig } from "../types/session.js";

export const serverInfo = {
  name: "assisted-installer-mcp-server",
  version: "0.1.0",
} as const;

export const DEFAULT_SSO_URL =
  "https://sso.redhat.com/auth/realms/redhat-external/protocol/openid-connect/token";
export const DEFAULT_INVENTORY_URL =
  "https://api.openshift.com/api/assisted-install/v2";
export const DEFAULT_PULL_SECRET_URL =
  "https://api.openshift.com/api/accounts_mgmt/v1/access_token";

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(
      `Environment variable ${name} must be an integer, got "${raw}"`,
    );
  }
  return value;
}

function readString(env: Env, name: string, fallback: string): string {
  const raw = env[name]?.trim();
  return raw ? raw : fallback;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const offlineToken = env.OFFLINE_TOKEN?.trim();

  const config: ServerConfig = {
    defaultOfflineToken: offlineToken ? offlineToken : undefined,
    sso: {
      url: readString(env, "SSO_URL", DEFAULT_SSO_URL),
      clientId: readString(env, "SSO_CLIENT_ID", "cloud-services"),
    },
    inventory: {
      url: readString(env, "INVENTORY_URL", DEFAULT_INVENTORY_URL).replace(
        /\/+$/,
        "",
      ),
      pullSecretUrl: readString(env, "PULL_SECRET_URL", DEFAULT_PULL_SECRET_URL),
    },
    requestTimeoutMs: readInt(env, "REQUEST_TIMEOUT_MS", 30000),
    cache: {
      maxCacheSize: readInt(env, "TOKEN_CACHE_MAX_SIZE", 1000),
      safetyBufferSeconds: readInt(env, "TOKEN_SAFETY_BUFFER_SECONDS", 60),
    },
    tools: {
      allowOnlyNonDestructive: env.ALLOW_ONLY_NON_DESTRUCTIVE_TOOLS === "true",
    },
    http: {
      enabled: Boolean(env.ENABLE_STREAMABLE_HTTP_TRANSPORT),
      host: readString(env, "HOST", "0.0.0.0"),
      port: readInt(env, "PORT", 3000),
    },
  };

  validateServerConfig(config);
  return config;
}

function assertUrl(name: string, value: string): void {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigurationError(`${name} is not a valid URL: ${value}`);
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new ConfigurationError(`${name} must use http or https: ${value}`);
  }
}

export function validateServerConfig(config: ServerConfig): void {
  assertUrl("SSO_URL", config.sso.url);
  assertUrl("INVENTORY_URL", config.inventory.url);
  assertUrl("PULL_SECRET_URL", config.inventory.pullSecretUrl);

  if (config.requestTimeoutMs <= 0) {
    throw new ConfigurationError("Request timeout must be positive");
  }

  if (
    config.cache.maxCacheSize <= 0 ||
    config.cache.safetyBufferSeconds < 0
  ) {
    throw new ConfigurationError(
      "Cache configuration must have positive values",
    );
  }

  if (config.http.port <= 0 || config.http.port > 65535) {
    throw new ConfigurationError(`Invalid port: ${config.http.port}`);
  }
}
