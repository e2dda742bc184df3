/**
 * JWKS Cache
 *
 * Fetches and caches each cluster's signing keys. Key sets are replaced as a
 * whole on refresh, never mutated, and concurrent misses for one cluster
 * share a single outbound fetch.
 */

import { importJWK, type KeyLike } from 'jose';
import { ValidationError } from './errors.js';
import { outboundOptions, type HttpClient, type HttpJsonResponse } from './http.js';
import type { OIDCDiscoveryClient } from './oidc-discovery.js';
import type { ClusterTrust, PublishedJwk } from './types.js';

const JWKS_CACHE_TTL = 3600; // 1 hour default
const JWKS_MIN_REFRESH = 30;

export interface KeySet {
  jwksUri: string;
  keys: ReadonlyMap<string, KeyLike>;
  fetchedAt: number;
}

interface DiscoveryEntry {
  jwksUri: string;
  expiresAt: number;
}

export interface JWKSCacheOptions {
  ttlSec?: number;
  /** Minimum age of a key set before an unknown kid may trigger a refetch */
  minRefreshSec?: number;
  timeoutMs?: number;
  /** Milliseconds clock */
  now?: () => number;
}

/**
 * Resolve when `promise` settles or reject when `signal` aborts, whichever
 * comes first. The shared promise is left running either way.
 */
function waitFor<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ValidationError('jwks_fetch_failed', 'Key lookup aborted by caller'));
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Convert a published RSA JWK (modulus/exponent) into a verification key
 */
export async function rsaKeyFromJwk(jwk: PublishedJwk): Promise<KeyLike> {
  if (typeof jwk.n !== 'string' || typeof jwk.e !== 'string') {
    throw new Error('RSA key is missing n or e');
  }
  const key = await importJWK({ kty: 'RSA', n: jwk.n, e: jwk.e }, 'RS256');
  if (key instanceof Uint8Array) {
    throw new Error('RSA key imported as a symmetric secret');
  }
  return key;
}

function isPublishedJwk(value: unknown): value is PublishedJwk {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class JWKSCacheManager {
  private readonly entries = new Map<string, KeySet>();
  private readonly discovered = new Map<string, DiscoveryEntry>();
  private readonly inflight = new Map<string, Promise<KeySet>>();
  private readonly ttlMs: number;
  private readonly minRefreshMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly http: HttpClient,
    private readonly discovery: OIDCDiscoveryClient,
    options: JWKSCacheOptions = {}
  ) {
    this.ttlMs = (options.ttlSec ?? JWKS_CACHE_TTL) * 1000;
    this.minRefreshMs = (options.minRefreshSec ?? JWKS_MIN_REFRESH) * 1000;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Find the verification key for `kid` in the cluster's key set, fetching
   * the set on a miss or after its TTL.
   */
  async getKey(trust: ClusterTrust, kid: string, signal?: AbortSignal): Promise<KeyLike> {
    let entry = this.entries.get(trust.name);
    let refreshed = false;

    if (!entry || this.now() - entry.fetchedAt >= this.ttlMs) {
      entry = await waitFor(this.refresh(trust), signal);
      refreshed = true;
    }

    let key = entry.keys.get(kid);
    if (key) {
      return key;
    }

    // Unknown kid: the cluster may have rotated keys since we last fetched
    if (!refreshed && this.now() - entry.fetchedAt >= this.minRefreshMs) {
      console.log(`[JWKSCache] Unknown kid ${kid} for cluster ${trust.name}, refreshing key set`);
      entry = await waitFor(this.refresh(trust), signal);
      key = entry.keys.get(kid);
      if (key) {
        return key;
      }
    }

    throw new ValidationError('jwks_fetch_failed', `Key with kid ${kid} not found in JWKS for cluster ${trust.name}`);
  }

  /**
   * Start a key set fetch for the cluster, or join the one in flight
   */
  private refresh(trust: ClusterTrust): Promise<KeySet> {
    const pending = this.inflight.get(trust.name);
    if (pending) {
      return pending;
    }

    const promise = this.fetchKeySet(trust)
      .then((keySet) => {
        this.entries.set(trust.name, keySet);
        return keySet;
      })
      .finally(() => {
        this.inflight.delete(trust.name);
      });

    this.inflight.set(trust.name, promise);
    return promise;
  }

  private async resolveJwksUri(trust: ClusterTrust): Promise<string> {
    if (trust.jwksUri) {
      return trust.jwksUri;
    }

    const cacheKey = `${trust.name}\n${trust.issuer}`;
    const cached = this.discovered.get(cacheKey);
    if (cached && this.now() < cached.expiresAt) {
      return cached.jwksUri;
    }

    const jwksUri = await this.discovery.discover(trust);
    this.discovered.set(cacheKey, { jwksUri, expiresAt: this.now() + this.ttlMs });
    return jwksUri;
  }

  private async fetchKeySet(trust: ClusterTrust): Promise<KeySet> {
    const jwksUri = await this.resolveJwksUri(trust);
    const options = await outboundOptions(trust, this.timeoutMs);

    let response: HttpJsonResponse;
    try {
      response = await this.http.getJson(jwksUri, {
        ...options,
        accept: 'application/json, application/jwk-set+json',
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[JWKSCache] Failed to fetch JWKS from ${jwksUri}: ${message}`);
      this.discovered.delete(`${trust.name}\n${trust.issuer}`);
      throw new ValidationError('jwks_fetch_failed', `JWKS fetch failed for cluster ${trust.name}: ${message}`, {
        cause: error,
      });
    }

    if (response.status !== 200) {
      this.discovered.delete(`${trust.name}\n${trust.issuer}`);
      throw new ValidationError(
        'jwks_fetch_failed',
        `JWKS endpoint for cluster ${trust.name} returned HTTP ${response.status}`
      );
    }

    const { body } = response;
    const published = typeof body === 'object' && body !== null && 'keys' in body ? body.keys : undefined;
    if (!Array.isArray(published)) {
      throw new ValidationError('jwks_fetch_failed', `Invalid JWKS for cluster ${trust.name}: missing keys array`);
    }

    const keys = new Map<string, KeyLike>();
    for (const jwk of published) {
      if (!isPublishedJwk(jwk)) {
        continue;
      }
      if (jwk.kty !== 'RSA') {
        console.warn(`[JWKSCache] Skipping non-RSA key ${String(jwk.kid)} (kty ${String(jwk.kty)}) for cluster ${trust.name}`);
        continue;
      }
      if (typeof jwk.kid !== 'string' || jwk.kid.length === 0) {
        console.warn(`[JWKSCache] Skipping key without kid for cluster ${trust.name}`);
        continue;
      }
      try {
        keys.set(jwk.kid, await rsaKeyFromJwk(jwk));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[JWKSCache] Skipping key ${jwk.kid} for cluster ${trust.name}: ${message}`);
      }
    }

    console.log(`[JWKSCache] Fetched JWKS from ${jwksUri}: ${keys.size} usable key(s)`);
    return { jwksUri, keys, fetchedAt: this.now() };
  }

  /**
   * Drop the cached key set and discovery result for one cluster
   */
  invalidate(clusterName: string): void {
    this.entries.delete(clusterName);
    for (const key of this.discovered.keys()) {
      if (key.startsWith(`${clusterName}\n`)) {
        this.discovered.delete(key);
      }
    }
    console.log(`[JWKSCache] Invalidated JWKS cache for ${clusterName}`);
  }

  /**
   * Clear all cached key sets; returns how many were dropped
   */
  clear(): number {
    const cleared = this.entries.size;
    this.entries.clear();
    this.discovered.clear();
    console.log(`[JWKSCache] Cleared ${cleared} JWKS cache entries`);
    return cleared;
  }

  size(): number {
    return this.entries.size;
  }
}
