import jwt from "jsonwebtoken";
import { LRUCache } from "lru-cache";
import { beforeEach, describe, expect, it } from "vitest";
import { SsoTokenManager } from "../../../src/auth/sso-token-manager.js";
import {
  SSO_CACHE_PREFIX,
  buildCacheKey,
  hashCredential,
} from "../../../src/constants/naming.js";
import {
  AuthError,
  BackendUnavailableError,
  ServiceErrorCode,
} from "../../../src/types/errors.js";
import type { CachedToken } from "../../../src/types/session.js";
import { SSO_URL, StubBackend, testConfig } from "../../helpers/stub-backend.js";

describe("SsoTokenManager", () => {
  let backend: StubBackend;
  let tokens: SsoTokenManager;

  beforeEach(() => {
    backend = new StubBackend();
    tokens = new SsoTokenManager(testConfig(), backend.http);
  });

  it("exchanges the offline token with the refresh_token grant", async () => {
    backend.withSso();

    await expect(tokens.getAccessToken("offline-a")).resolves.toBe("access-1");

    const [request] = backend.requests;
    expect(request.method).toBe("POST");
    expect(request.url).toBe(SSO_URL);
    expect(request.data).toBe(
      "client_id=cloud-services&grant_type=refresh_token&refresh_token=offline-a",
    );
  });

  it("serves a cached token without a second exchange", async () => {
    backend.withSso();

    await tokens.getAccessToken("offline-a");
    await expect(tokens.getAccessToken("offline-a")).resolves.toBe("access-1");

    expect(backend.exchangeCount).toBe(1);
    expect(tokens.size).toBe(1);
  });

  it("issues a single exchange for concurrent callers of one credential", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    backend.on("POST", SSO_URL, async () => {
      await gate;
      return { status: 200, data: { access_token: "shared", expires_in: 900 } };
    });

    const pending = Promise.all(
      Array.from({ length: 10 }, () => tokens.getAccessToken("offline-a")),
    );
    release();

    await expect(pending).resolves.toEqual(Array(10).fill("shared"));
    expect(backend.exchangeCount).toBe(1);
  });

  it("keeps credentials isolated from each other", async () => {
    backend.on("POST", SSO_URL, (request) => {
      const owner = String(request.data).endsWith("offline-a") ? "a" : "b";
      return { status: 200, data: { access_token: `token-${owner}`, expires_in: 900 } };
    });

    const [a, b] = await Promise.all([
      tokens.getAccessToken("offline-a"),
      tokens.getAccessToken("offline-b"),
    ]);

    expect(a).toBe("token-a");
    expect(b).toBe("token-b");
    expect(backend.exchangeCount).toBe(2);
  });

  it("exchanges again when the token expires inside the safety buffer", async () => {
    // 30s lifetime is shorter than the default 60s buffer.
    backend.withSso(30);

    await expect(tokens.getAccessToken("offline-a")).resolves.toBe("access-1");
    await expect(tokens.getAccessToken("offline-a")).resolves.toBe("access-2");
    expect(backend.exchangeCount).toBe(2);
  });

  it("falls back to the exp claim when expires_in is missing", async () => {
    const accessToken = jwt.sign(
      { exp: Math.floor(Date.now() / 1000) + 3600 },
      "test-secret",
    );
    backend.on("POST", SSO_URL, {
      status: 200,
      data: { access_token: accessToken },
    });

    await tokens.getAccessToken("offline-a");
    await expect(tokens.getAccessToken("offline-a")).resolves.toBe(accessToken);
    expect(backend.exchangeCount).toBe(1);
  });

  it("raises AuthError when SSO rejects the offline token", async () => {
    backend.on("POST", SSO_URL, {
      status: 400,
      data: { error: "invalid_grant", error_description: "Offline user session not found" },
    });

    const failure = tokens.getAccessToken("offline-expired");
    await expect(failure).rejects.toBeInstanceOf(AuthError);
    await expect(failure).rejects.toThrow(
      "Offline token rejected by SSO: Offline user session not found",
    );
    expect(tokens.size).toBe(0);
  });

  it("raises AuthError when the response has no access token", async () => {
    backend.on("POST", SSO_URL, { status: 200, data: { token_type: "Bearer" } });

    await expect(tokens.getAccessToken("offline-a")).rejects.toThrow(
      "No access token received from SSO",
    );
  });

  it("classifies a timed out exchange as BackendUnavailable", async () => {
    backend.on("POST", SSO_URL, { fail: "timeout" });

    const failure = tokens.getAccessToken("offline-a");
    await expect(failure).rejects.toBeInstanceOf(BackendUnavailableError);
    await expect(failure).rejects.toMatchObject({
      code: ServiceErrorCode.BACKEND_UNAVAILABLE,
    });
  });

  it("classifies an SSO server error as BackendUnavailable", async () => {
    backend.on("POST", SSO_URL, { status: 503, data: "unavailable" });

    await expect(tokens.getAccessToken("offline-a")).rejects.toThrow(
      "Token exchange failed with status 503",
    );
  });

  it("recovers after a failed exchange", async () => {
    backend.withSso();
    backend.on("POST", SSO_URL, { fail: "network" });
    await expect(tokens.getAccessToken("offline-a")).rejects.toBeInstanceOf(
      BackendUnavailableError,
    );

    backend.withSso();
    await expect(tokens.getAccessToken("offline-a")).resolves.toBe("access-1");
  });

  it("stores tokens in an injected cache keyed by the credential hash", async () => {
    backend.withSso();
    const store = new LRUCache<string, CachedToken>({ max: 10 });
    const shared = new SsoTokenManager(testConfig(), backend.http, store);

    await shared.getAccessToken("offline-a");

    const key = buildCacheKey(SSO_CACHE_PREFIX, hashCredential("offline-a"));
    expect(store.get(key)?.token).toBe("access-1");
    expect([...store.keys()]).toEqual([key]);
  });

  it("serves a token already present in an injected cache", async () => {
    backend.withSso();
    const store = new LRUCache<string, CachedToken>({ max: 10 });
    store.set(buildCacheKey(SSO_CACHE_PREFIX, hashCredential("offline-a")), {
      token: "preloaded-access",
      expiresAt: Date.now() + 600_000,
    });
    const shared = new SsoTokenManager(testConfig(), backend.http, store);

    await expect(shared.getAccessToken("offline-a")).resolves.toBe("preloaded-access");
    expect(backend.exchangeCount).toBe(0);
  });

  describe("refreshAccessToken", () => {
    it("replaces the rejected token with a fresh exchange", async () => {
      backend.withSso();
      const first = await tokens.getAccessToken("offline-a");

      await expect(tokens.refreshAccessToken("offline-a", first)).resolves.toBe(
        "access-2",
      );
      await expect(tokens.getAccessToken("offline-a")).resolves.toBe("access-2");
      expect(backend.exchangeCount).toBe(2);
    });

    it("reuses a replacement obtained by another caller", async () => {
      backend.withSso();
      const first = await tokens.getAccessToken("offline-a");

      const [one, two] = await Promise.all([
        tokens.refreshAccessToken("offline-a", first),
        tokens.refreshAccessToken("offline-a", first),
      ]);
      const three = await tokens.refreshAccessToken("offline-a", first);

      expect([one, two, three]).toEqual(["access-2", "access-2", "access-2"]);
      expect(backend.exchangeCount).toBe(2);
    });
  });
});
