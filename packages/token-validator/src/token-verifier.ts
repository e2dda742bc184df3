/**
 * Token Parser & Verifier
 *
 * Verifies Kubernetes ServiceAccount tokens (RS256) against the issuing
 * cluster's published keys. jose checks the signature; expiry is checked
 * here against the injected clock.
 */

import { compactVerify, errors, type KeyLike } from 'jose';
import { ValidationError } from './errors.js';
import { decodeToken, numericClaim, requireSigningHeader } from './jwt.js';
import { systemClock, type Clock, type ClusterTrust, type ParsedToken } from './types.js';

export interface KeyResolver {
  getKey(trust: ClusterTrust, kid: string, signal?: AbortSignal): Promise<KeyLike>;
}

/**
 * Check the RS256 signature over `header.payload` exactly as received
 */
async function verifySignature(token: string, key: KeyLike): Promise<void> {
  try {
    await compactVerify(token, key, { algorithms: ['RS256'] });
  } catch (error) {
    if (error instanceof errors.JWSSignatureVerificationFailed) {
      throw new ValidationError('invalid_signature', 'Token signature verification failed');
    }
    if (error instanceof errors.JWSInvalid || error instanceof errors.JOSEAlgNotAllowed) {
      throw new ValidationError('invalid_token', `Malformed JWT: ${error.message}`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError('invalid_signature', `Token signature verification failed: ${message}`, {
      cause: error,
    });
  }
}

export interface TokenVerifierOptions {
  now?: Clock;
  /** Treat a missing exp as expired instead of non-expiring */
  requireExp?: boolean;
}

export class TokenVerifier {
  private readonly now: Clock;
  private readonly requireExp: boolean;

  constructor(
    private readonly keys: KeyResolver,
    options: TokenVerifierOptions = {}
  ) {
    this.now = options.now ?? systemClock;
    this.requireExp = options.requireExp ?? false;
  }

  /**
   * Parse and verify a raw token for the given cluster.
   * Every failed step throws a ValidationError.
   */
  async verify(rawToken: string, trust: ClusterTrust, signal?: AbortSignal): Promise<ParsedToken> {
    // 1-2. Structure and encoding
    const { header: rawHeader, payload } = decodeToken(rawToken);
    if (rawToken.endsWith('.')) {
      throw new ValidationError('invalid_token', 'Malformed JWT: missing signature');
    }

    // 3. kid and algorithm
    const header = requireSigningHeader(rawHeader);

    // 4. Resolve the key; cache errors propagate with their own kind
    const key = await this.keys.getKey(trust, header.kid, signal);

    // 5. Signature
    await verifySignature(rawToken, key);

    // 6. Expiry
    const expiration = numericClaim(payload, 'exp');
    const issuedAt = numericClaim(payload, 'iat');
    if (expiration === undefined) {
      if (this.requireExp) {
        throw new ValidationError('token_expired', 'Token has no exp claim');
      }
      console.warn(`[TokenVerifier] Token for cluster ${trust.name} has no exp claim; treating as non-expiring`);
    } else if (expiration < this.now()) {
      throw new ValidationError('token_expired', 'Token has expired');
    }

    // 7. Issuer mismatch is logged only: trust is keyed by cluster name
    if (payload.iss !== trust.issuer) {
      console.warn(
        `[TokenVerifier] Issuer mismatch for cluster ${trust.name}: expected ${trust.issuer}, got ${String(payload.iss)}`
      );
    }

    return { header, payload, expiration, issuedAt };
  }
}
