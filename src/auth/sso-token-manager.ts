import type { AxiosInstance } from "axios";
import { LRUCache } from "lru-cache";
import {
  SSO_CACHE_PREFIX,
  buildCacheKey,
  credentialFingerprint,
  hashCredential,
} from "../constants/naming.js";
import type { CachedToken, ServerConfig } from "../types/session.js";
import { errorMessage, getLogger } from "../utils/logger.js";
import { TokenManagerBase } from "./token-manager-base.js";

const logger = getLogger("sso-token-manager");

/** The process-wide access token store, bounded by `TOKEN_CACHE_MAX_SIZE`. */
export function createTokenCache(
  config: ServerConfig,
): LRUCache<string, CachedToken> {
  return new LRUCache<string, CachedToken>({
    max: config.cache.maxCacheSize,
  });
}

/**
 * Exchanges offline tokens for access tokens and caches the result per
 * offline token. Concurrent callers for the same offline token share one
 * in-flight exchange; different offline tokens never wait on each other.
 */
export class SsoTokenManager extends TokenManagerBase {
  private tokenCache: LRUCache<string, CachedToken>;
  private activeRequests: Map<string, Promise<CachedToken>> = new Map();

  constructor(
    config: ServerConfig,
    http: AxiosInstance,
    tokenCache: LRUCache<string, CachedToken> = createTokenCache(config),
  ) {
    super(config, http);
    this.tokenCache = tokenCache;
  }

  async getAccessToken(offlineToken: string): Promise<string> {
    const cacheKey = this.cacheKeyFor(offlineToken);

    const cached = this.tokenCache.get(cacheKey);
    if (cached && this.isFresh(cached)) {
      return cached.token;
    }

    const result = await this.acquire(cacheKey, offlineToken);
    return result.token;
  }

  /**
   * Forced refresh after the backend rejected `rejectedToken`. When another
   * caller has already replaced that token, the replacement is returned
   * without a new exchange.
   */
  async refreshAccessToken(
    offlineToken: string,
    rejectedToken: string,
  ): Promise<string> {
    const cacheKey = this.cacheKeyFor(offlineToken);

    const cached = this.tokenCache.get(cacheKey);
    if (cached && cached.token !== rejectedToken && this.isFresh(cached)) {
      return cached.token;
    }

    if (cached?.token === rejectedToken) {
      this.tokenCache.delete(cacheKey);
    }

    logger.info("Forcing access token refresh", {
      credential: credentialFingerprint(offlineToken),
    });

    const result = await this.acquire(cacheKey, offlineToken);
    return result.token;
  }

  get size(): number {
    return this.tokenCache.size;
  }

  private cacheKeyFor(offlineToken: string): string {
    return buildCacheKey(SSO_CACHE_PREFIX, hashCredential(offlineToken));
  }

  private isFresh(token: CachedToken): boolean {
    const bufferMs = this.config.cache.safetyBufferSeconds * 1000;
    return token.expiresAt > Date.now() + bufferMs;
  }

  private acquire(
    cacheKey: string,
    offlineToken: string,
  ): Promise<CachedToken> {
    let activeRequest = this.activeRequests.get(cacheKey);
    if (!activeRequest) {
      activeRequest = this.executeTokenAcquisition(cacheKey, offlineToken);
      this.activeRequests.set(cacheKey, activeRequest);
    }
    return activeRequest;
  }

  private async executeTokenAcquisition(
    cacheKey: string,
    offlineToken: string,
  ): Promise<CachedToken> {
    const credential = credentialFingerprint(offlineToken);
    logger.debug("Exchanging offline token for access token", { credential });

    try {
      const result = await this.performTokenExchange(offlineToken);
      const ttl = result.expiresAt - Date.now();
      if (ttl > 0) {
        this.tokenCache.set(cacheKey, result, { ttl });
      }
      logger.debug("Access token acquired", {
        credential,
        expiresAt: new Date(result.expiresAt).toISOString(),
      });
      return result;
    } catch (error) {
      logger.warn("Access token acquisition failed", {
        credential,
        error: errorMessage(error),
      });
      throw error;
    } finally {
      this.activeRequests.delete(cacheKey);
    }
  }
}
