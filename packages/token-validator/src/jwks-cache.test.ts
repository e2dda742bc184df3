import { describe, it, expect, beforeAll } from "vitest";
import { exportJWK } from "jose";
import { JWKSCacheManager, rsaKeyFromJwk } from "./jwks-cache.js";
import { OIDCDiscoveryClient } from "./oidc-discovery.js";
import {
  FakeHttpClient,
  createTestKey,
  testCluster,
  thrownKind,
  type TestKey,
} from "./__tests__/helpers.js";

const WELL_KNOWN = "https://cluster-a.example.com/.well-known/openid-configuration";
const JWKS_URI = "https://cluster-a.example.com/openid/v1/jwks";

describe("JWKSCacheManager", () => {
  let current: TestKey;
  let rotated: TestKey;

  beforeAll(() => {
    current = createTestKey("key-1");
    rotated = createTestKey("key-2");
  });

  function setup(keys: () => unknown[], options: { ttlSec?: number; minRefreshSec?: number } = {}) {
    let nowMs = 1_700_000_000_000;
    const http = new FakeHttpClient()
      .json(WELL_KNOWN, { jwks_uri: JWKS_URI })
      .on(JWKS_URI, () => ({ status: 200, body: { keys: keys() } }));
    const cache = new JWKSCacheManager(http, new OIDCDiscoveryClient(http), {
      ...options,
      now: () => nowMs,
    });
    const advance = (seconds: number) => {
      nowMs += seconds * 1000;
    };
    return { http, cache, advance };
  }

  it("discovers the JWKS URI and returns the key for a kid", async () => {
    const { http, cache } = setup(() => [current.jwk]);

    const key = await cache.getKey(testCluster(), "key-1");

    expect(await exportJWK(key)).toEqual({ kty: "RSA", n: current.jwk.n, e: current.jwk.e });
    expect(http.callsTo(WELL_KNOWN)).toBe(1);
    expect(http.callsTo(JWKS_URI)).toBe(1);
    expect(cache.size()).toBe(1);
  });

  it("serves later lookups from the cache", async () => {
    const { http, cache } = setup(() => [current.jwk]);

    await cache.getKey(testCluster(), "key-1");
    await cache.getKey(testCluster(), "key-1");

    expect(http.callsTo(JWKS_URI)).toBe(1);
  });

  it("shares one fetch between concurrent misses", async () => {
    const { http, cache } = setup(() => [current.jwk]);

    const keys = await Promise.all([
      cache.getKey(testCluster(), "key-1"),
      cache.getKey(testCluster(), "key-1"),
      cache.getKey(testCluster(), "key-1"),
    ]);

    expect(keys).toHaveLength(3);
    expect(http.callsTo(WELL_KNOWN)).toBe(1);
    expect(http.callsTo(JWKS_URI)).toBe(1);
  });

  it("shares one refetch between concurrent lookups of an expired entry", async () => {
    const { http, cache, advance } = setup(() => [current.jwk], { ttlSec: 60 });

    await cache.getKey(testCluster(), "key-1");
    advance(61);

    const keys = await Promise.all([
      cache.getKey(testCluster(), "key-1"),
      cache.getKey(testCluster(), "key-1"),
    ]);

    expect(keys).toHaveLength(2);
    expect(http.callsTo(JWKS_URI)).toBe(2);
    expect(http.callsTo(WELL_KNOWN)).toBe(2);
  });

  it("uses a static jwks_uri without discovery", async () => {
    const { http, cache } = setup(() => [current.jwk]);

    await cache.getKey(testCluster({ jwksUri: JWKS_URI }), "key-1");

    expect(http.callsTo(WELL_KNOWN)).toBe(0);
    expect(http.callsTo(JWKS_URI)).toBe(1);
  });

  it("refetches after the TTL", async () => {
    const { http, cache, advance } = setup(() => [current.jwk], { ttlSec: 60 });

    await cache.getKey(testCluster(), "key-1");
    advance(61);
    await cache.getKey(testCluster(), "key-1");

    expect(http.callsTo(JWKS_URI)).toBe(2);
  });

  it("does not refetch for an unknown kid inside the minimum refresh interval", async () => {
    const { http, cache, advance } = setup(() => [current.jwk], { minRefreshSec: 30 });

    await cache.getKey(testCluster(), "key-1");
    advance(10);

    expect(await thrownKind(() => cache.getKey(testCluster(), "key-2"))).toBe("jwks_fetch_failed");
    expect(http.callsTo(JWKS_URI)).toBe(1);
  });

  it("picks up a rotated key once the minimum refresh interval has passed", async () => {
    let published = [current.jwk];
    const { http, cache, advance } = setup(() => published, { minRefreshSec: 30 });

    await cache.getKey(testCluster(), "key-1");
    published = [current.jwk, rotated.jwk];
    advance(31);

    const key = await cache.getKey(testCluster(), "key-2");

    expect(await exportJWK(key)).toEqual({ kty: "RSA", n: rotated.jwk.n, e: rotated.jwk.e });
    expect(http.callsTo(JWKS_URI)).toBe(2);
  });

  it("skips keys it cannot use", async () => {
    const { cache } = setup(() => [
      { kty: "EC", kid: "ec-key", crv: "P-256", x: "AA", y: "AA" },
      { kty: "RSA", n: current.jwk.n, e: current.jwk.e },
      { kty: "RSA", kid: "broken", n: current.jwk.n },
      current.jwk,
    ]);

    await expect(cache.getKey(testCluster(), "key-1")).resolves.toBeDefined();
    expect(await thrownKind(() => cache.getKey(testCluster(), "ec-key"))).toBe("jwks_fetch_failed");
    expect(await thrownKind(() => cache.getKey(testCluster(), "broken"))).toBe("jwks_fetch_failed");
  });

  it("fails on a JWKS error response and forgets the discovery result", async () => {
    const http = new FakeHttpClient()
      .json(WELL_KNOWN, { jwks_uri: JWKS_URI })
      .json(JWKS_URI, { message: "Forbidden" }, 403);
    const cache = new JWKSCacheManager(http, new OIDCDiscoveryClient(http));

    expect(await thrownKind(() => cache.getKey(testCluster(), "key-1"))).toBe("jwks_fetch_failed");
    expect(await thrownKind(() => cache.getKey(testCluster(), "key-1"))).toBe("jwks_fetch_failed");

    expect(http.callsTo(WELL_KNOWN)).toBe(2);
    expect(cache.size()).toBe(0);
  });

  it("fails on a document without keys", async () => {
    const http = new FakeHttpClient().json(WELL_KNOWN, { jwks_uri: JWKS_URI }).json(JWKS_URI, { items: [] });
    const cache = new JWKSCacheManager(http, new OIDCDiscoveryClient(http));

    expect(await thrownKind(() => cache.getKey(testCluster(), "key-1"))).toBe("jwks_fetch_failed");
  });

  it("reports discovery failures with their own kind", async () => {
    const http = new FakeHttpClient();
    const cache = new JWKSCacheManager(http, new OIDCDiscoveryClient(http));

    expect(await thrownKind(() => cache.getKey(testCluster(), "key-1"))).toBe("discovery_failed");
  });

  it("keeps the shared fetch running when a caller aborts", async () => {
    const { http, cache } = setup(() => [current.jwk]);
    const controller = new AbortController();
    controller.abort();

    expect(await thrownKind(() => cache.getKey(testCluster(), "key-1", controller.signal))).toBe(
      "jwks_fetch_failed",
    );
    await cache.getKey(testCluster(), "key-1");

    expect(http.callsTo(JWKS_URI)).toBe(1);
  });

  it("keeps clusters apart even when they share an issuer", async () => {
    const { http, cache } = setup(() => [current.jwk]);

    await cache.getKey(testCluster({ name: "cluster-a" }), "key-1");
    await cache.getKey(testCluster({ name: "cluster-b" }), "key-1");

    expect(cache.size()).toBe(2);
    expect(http.callsTo(JWKS_URI)).toBe(2);
  });

  it("invalidates and clears entries", async () => {
    const { http, cache } = setup(() => [current.jwk]);

    await cache.getKey(testCluster({ name: "cluster-a" }), "key-1");
    await cache.getKey(testCluster({ name: "cluster-b" }), "key-1");

    cache.invalidate("cluster-a");
    expect(cache.size()).toBe(1);

    await cache.getKey(testCluster({ name: "cluster-a" }), "key-1");
    expect(http.callsTo(WELL_KNOWN)).toBe(3);

    expect(cache.clear()).toBe(2);
    expect(cache.size()).toBe(0);
  });
});

describe("rsaKeyFromJwk", () => {
  it("imports a published RSA key", async () => {
    const key = await rsaKeyFromJwk(createTestKey("key-3").jwk);
    expect(key.type).toBe("public");
  });

  it("rejects a key without a modulus", async () => {
    await expect(rsaKeyFromJwk({ kty: "RSA", e: "AQAB" })).rejects.toThrow(/missing n or e/);
  });
});
