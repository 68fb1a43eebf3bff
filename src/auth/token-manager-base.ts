import { AxiosError, type AxiosInstance } from "axios";
import jwt from "jsonwebtoken";
import {
  AuthError,
  BackendUnavailableError,
} from "../types/errors.js";
import type { CachedToken, ServerConfig } from "../types/session.js";

export const DEFAULT_TOKEN_LIFETIME_MS = 5 * 60 * 1000;

interface SsoTokenResponse {
  access_token?: unknown;
  expires_in?: unknown;
  error?: unknown;
  error_description?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function describeTransportFailure(error: unknown): string {
  if (error instanceof AxiosError) {
    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return `request timed out (${error.message})`;
    }
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export abstract class TokenManagerBase {
  protected config: ServerConfig;
  protected http: AxiosInstance;

  constructor(config: ServerConfig, http: AxiosInstance) {
    this.config = config;
    this.http = http;
  }

  protected async performTokenExchange(
    offlineToken: string,
  ): Promise<CachedToken> {
    const form = new URLSearchParams({
      client_id: this.config.sso.clientId,
      grant_type: "refresh_token",
      refresh_token: offlineToken,
    });

    let status: number;
    let body: unknown;
    try {
      const response = await this.http.post<unknown>(
        this.config.sso.url,
        form.toString(),
        {
          headers: { "Content-Type": "application/x-www-form-urlencoded" },
          timeout: this.config.requestTimeoutMs,
          validateStatus: () => true,
        },
      );
      status = response.status;
      body = response.data;
    } catch (error) {
      throw new BackendUnavailableError(
        `Token exchange failed: ${describeTransportFailure(error)}`,
        { cause: error },
      );
    }

    if (status >= 500) {
      throw new BackendUnavailableError(
        `Token exchange failed with status ${status}`,
      );
    }

    const payload: SsoTokenResponse = isRecord(body) ? body : {};

    if (status < 200 || status >= 300) {
      const reason =
        typeof payload.error_description === "string"
          ? payload.error_description
          : typeof payload.error === "string"
            ? payload.error
            : `status ${status}`;
      throw new AuthError(`Offline token rejected by SSO: ${reason}`);
    }

    if (typeof payload.access_token !== "string" || !payload.access_token) {
      throw new AuthError("No access token received from SSO");
    }

    return {
      token: payload.access_token,
      expiresAt: this.computeExpiry(payload.access_token, payload.expires_in),
    };
  }

  private computeExpiry(accessToken: string, expiresIn: unknown): number {
    if (typeof expiresIn === "number" && expiresIn > 0) {
      return Date.now() + expiresIn * 1000;
    }

    const decoded = jwt.decode(accessToken);
    if (isRecord(decoded) && typeof decoded.exp === "number") {
      return decoded.exp * 1000;
    }

    return Date.now() + DEFAULT_TOKEN_LIFETIME_MS;
  }
}
