/**
 * Engine wiring
 *
 * One JWKS cache, verifier and validator per process, shared by every
 * request.
 */

import { ClusterRegistry } from './cluster-registry.js';
import { NodeHttpClient, type HttpClient } from './http.js';
import { JWKSCacheManager } from './jwks-cache.js';
import { OIDCDiscoveryClient } from './oidc-discovery.js';
import { TokenValidator } from './token-validator.js';
import { TokenVerifier } from './token-verifier.js';
import type { EngineConfig } from './config.js';
import type { Clock } from './types.js';

export interface Engine {
  registry: ClusterRegistry;
  jwksCache: JWKSCacheManager;
  verifier: TokenVerifier;
  validator: TokenValidator;
}

export interface EngineDeps {
  http?: HttpClient;
  now?: Clock;
}

export function createEngine(config: EngineConfig, registry: ClusterRegistry, deps: EngineDeps = {}): Engine {
  const http = deps.http ?? new NodeHttpClient();
  const discovery = new OIDCDiscoveryClient(http, config.fetchTimeoutMs);
  const jwksCache = new JWKSCacheManager(http, discovery, {
    ttlSec: config.jwksCacheTtlSec,
    minRefreshSec: config.jwksMinRefreshSec,
    timeoutMs: config.fetchTimeoutMs,
  });
  const verifier = new TokenVerifier(jwksCache, { now: deps.now, requireExp: config.requireExp });
  const validator = new TokenValidator(registry, verifier);

  return { registry, jwksCache, verifier, validator };
}

/**
 * Load the registry described by `config` and build an engine around it
 */
export async function loadEngine(config: EngineConfig, deps: EngineDeps = {}): Promise<Engine> {
  const registry = await ClusterRegistry.load({
    configPath: config.clusterConfigPath,
    serviceAccountDir: config.serviceAccountDir,
    maxTokenTtl: config.maxTokenTtl,
  });
  return createEngine(config, registry, deps);
}
