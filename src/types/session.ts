import type { IncomingHttpHeaders } from "node:http";
import type { RefreshBudget } from "../auth/refresh-budget.js";

export type CredentialKind = "offline" | "access";

export type CredentialSource = "header" | "environment";

export interface SessionCredential {
  kind: CredentialKind;
  token: string;
}

export interface SessionContext {
  readonly credential: Readonly<SessionCredential>;
  readonly source: CredentialSource;
  /** Per-invocation allowance for forced token refreshes. */
  readonly refreshBudget: RefreshBudget;
}

/**
 * What a transport knows about the caller. Only the streamable HTTP
 * transport carries headers; stdio passes an empty object.
 */
export interface TransportMetadata {
  headers?: IncomingHttpHeaders;
}

export interface CachedToken {
  token: string;
  expiresAt: number;
}

export interface ServerConfig {
  defaultOfflineToken?: string;
  sso: {
    url: string;
    clientId: string;
  };
  inventory: {
    url: string;
    pullSecretUrl: string;
  };
  requestTimeoutMs: number;
  cache: {
    maxCacheSize: number;
    safetyBufferSeconds: number;
  };
  tools: {
    allowOnlyNonDestructive: boolean;
  };
  http: {
    enabled: boolean;
    host: string;
    port: number;
  };
}
