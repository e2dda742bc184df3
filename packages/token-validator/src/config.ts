/**
 * Engine configuration from environment variables
 */

export const DEFAULT_MAX_TOKEN_TTL = 3600;
export const DEFAULT_SERVICE_ACCOUNT_DIR = '/var/run/secrets/kubernetes.io/serviceaccount';

export interface EngineConfig {
  /** Explicit cluster file; the default search paths are used when unset */
  clusterConfigPath?: string;
  serviceAccountDir: string;
  jwksCacheTtlSec: number;
  jwksMinRefreshSec: number;
  fetchTimeoutMs: number;
  maxTokenTtl: number;
  /** Reject tokens without an exp claim */
  requireExp: boolean;
}

type Env = Record<string, string | undefined>;

export function readIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a positive integer`);
  }
  return value;
}

export function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (raw === 'true' || raw === '1' || raw === 'yes') {
    return true;
  }
  if (raw === 'false' || raw === '0' || raw === 'no') {
    return false;
  }
  throw new Error(`Invalid ${name}: ${raw}. Must be true or false`);
}

/**
 * Load configuration from environment variables
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  return {
    clusterConfigPath: env.CLUSTER_CONFIG_PATH || undefined,
    serviceAccountDir: env.SERVICE_ACCOUNT_DIR || DEFAULT_SERVICE_ACCOUNT_DIR,
    jwksCacheTtlSec: readIntEnv(env, 'JWKS_CACHE_TTL_SEC', 3600),
    jwksMinRefreshSec: readIntEnv(env, 'JWKS_MIN_REFRESH_SEC', 30),
    fetchTimeoutMs: readIntEnv(env, 'FETCH_TIMEOUT_MS', 5000),
    maxTokenTtl: readIntEnv(env, 'MAX_TOKEN_TTL', DEFAULT_MAX_TOKEN_TTL),
    requireExp: readBoolEnv(env, 'REQUIRE_EXP', false),
  };
}
