/**
 * CLI configuration from environment variables
 */

import { loadEngineConfig, readIntEnv, type EngineConfig } from '@kube-federated-auth/token-validator';

export interface CliConfig {
  engine: EngineConfig;
  /** Central validation endpoint; local-only validation when unset */
  validatorUrl?: string;
  validatorTimeoutMs: number;
}

export function loadCliConfig(env: Record<string, string | undefined> = process.env): CliConfig {
  return {
    engine: loadEngineConfig(env),
    validatorUrl: env.KUBE_FEDERATED_AUTH_URL || undefined,
    validatorTimeoutMs: readIntEnv(env, 'VALIDATOR_TIMEOUT_MS', 5000),
  };
}
