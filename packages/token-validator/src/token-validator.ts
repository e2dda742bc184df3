/**
 * TokenValidator
 *
 * Validates a token for a named cluster: registry lookup, signature and
 * claim verification, token lifetime policy, identity canonicalization.
 * This is what the Validation API exposes.
 */

import { ValidationError, failure, toFailure } from './errors.js';
import { canonicalize } from './identity.js';
import type { ClusterRegistry } from './cluster-registry.js';
import type { TokenVerifier } from './token-verifier.js';
import type { ValidationResult } from './types.js';

/**
 * Reject tokens whose total lifetime (`exp - iat`) exceeds `maxTokenTtl`.
 * Skipped unless both claims are present.
 */
export function enforceMaxLifetime(
  expiration: number | null | undefined,
  issuedAt: number | null | undefined,
  maxTokenTtl: number
): void {
  if (expiration == null || issuedAt == null) {
    return;
  }
  const lifetime = expiration - issuedAt;
  if (lifetime > maxTokenTtl) {
    throw new ValidationError(
      'token_expired',
      `Token lifetime ${lifetime}s exceeds maximum allowed ${maxTokenTtl}s`
    );
  }
}

export class TokenValidator {
  constructor(
    private readonly registry: Pick<ClusterRegistry, 'get'>,
    private readonly verifier: Pick<TokenVerifier, 'verify'>
  ) {}

  /**
   * Validate `token` as issued by `clusterName`. Never throws.
   */
  async validate(clusterName: string, token: string, signal?: AbortSignal): Promise<ValidationResult> {
    const trust = this.registry.get(clusterName);
    if (!trust) {
      console.warn(`[TokenValidator] Unknown cluster: ${clusterName}`);
      return failure('cluster_not_found', `No configuration found for cluster: ${clusterName}`);
    }

    try {
      const parsed = await this.verifier.verify(token, trust, signal);
      enforceMaxLifetime(parsed.expiration, parsed.issuedAt, trust.maxTokenTtl);
      const username = canonicalize(trust.name, parsed.payload);

      console.log(`[TokenValidator] Validated ${username}`);
      return {
        authenticated: true,
        username,
        expiration: parsed.expiration ?? null,
        issued_at: parsed.issuedAt ?? null,
      };
    } catch (error) {
      const result = toFailure(error);
      if (result.error === 'internal_error') {
        console.error(`[TokenValidator] Validation error for cluster ${clusterName}:`, error);
      } else {
        console.warn(`[TokenValidator] Rejected token for cluster ${clusterName}: ${result.error} - ${result.message}`);
      }
      return result;
    }
  }
}
