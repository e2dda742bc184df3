/**
 * Service configuration
 *
 * Reads configuration from environment variables.
 */

import { loadEngineConfig, readIntEnv, type EngineConfig } from '@kube-federated-auth/token-validator';

export interface ServiceConfig {
  port: number;
  engine: EngineConfig;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServiceConfig {
  return {
    port: readIntEnv(env, 'PORT', 8080),
    engine: loadEngineConfig(env),
  };
}
