import { createHash } from "node:crypto";

export const CACHE_KEY_SEPARATOR = ":";
export const SSO_CACHE_PREFIX = "sso";
export const LOG_FILE_NAME = "assisted-service-mcp.log";

export const OFFLINE_TOKEN_HEADER = "ocm-offline-token";
export const AUTHORIZATION_HEADER = "authorization";

export function buildCacheKey(type: string, ...segments: string[]): string {
  return [type, ...segments].join(CACHE_KEY_SEPARATOR);
}

export function hashCredential(credential: string): string {
  return createHash("sha256").update(credential).digest("hex");
}

// Short, non-reversible handle for logs.
export function credentialFingerprint(credential: string): string {
  return hashCredential(credential).slice(0, 8);
}
