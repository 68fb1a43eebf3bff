import {
  AUTHORIZATION_HEADER,
  OFFLINE_TOKEN_HEADER,
} from "../constants/naming.js";
import { ConfigurationError } from "../types/errors.js";
import { RefreshBudget } from "./refresh-budget.js";
import type {
  SessionContext,
  TransportMetadata,
} from "../types/session.js";

function readHeader(
  metadata: TransportMetadata,
  name: string,
): string | undefined {
  const headers = metadata.headers;
  if (!headers) {
    return undefined;
  }
  // Node lower-cases incoming header names; other callers may not.
  const key = Object.keys(headers).find(
    (candidate) => candidate.toLowerCase() === name,
  );
  if (key === undefined) {
    return undefined;
  }
  const raw = headers[key];
  const value = Array.isArray(raw) ? raw[0] : raw;
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function bearerToken(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const parts = header.split(/\s+/);
  if (parts.length === 2 && parts[0].toLowerCase() === "bearer" && parts[1]) {
    return parts[1];
  }
  return undefined;
}

/**
 * Picks the credential for one invocation. Request headers win over the
 * process default; nothing here touches the network. Each call returns a
 * fresh refresh budget, so resolve once per invocation.
 */
export function resolveSession(
  metadata: TransportMetadata,
  defaultOfflineToken: string | undefined,
): SessionContext {
  const accessToken = bearerToken(readHeader(metadata, AUTHORIZATION_HEADER));
  if (accessToken) {
    return Object.freeze({
      credential: Object.freeze({ kind: "access", token: accessToken }),
      source: "header",
      refreshBudget: new RefreshBudget(),
    });
  }

  const headerToken = readHeader(metadata, OFFLINE_TOKEN_HEADER);
  if (headerToken) {
    return Object.freeze({
      credential: Object.freeze({ kind: "offline", token: headerToken }),
      source: "header",
      refreshBudget: new RefreshBudget(),
    });
  }

  if (defaultOfflineToken) {
    return Object.freeze({
      credential: Object.freeze({ kind: "offline", token: defaultOfflineToken }),
      source: "environment",
      refreshBudget: new RefreshBudget(),
    });
  }

  throw new ConfigurationError(
    "No offline token found in environment or request headers",
  );
}
