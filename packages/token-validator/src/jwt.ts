/**
 * JWT structure parsing
 *
 * Decodes compact JWS without trusting it. Nothing here verifies a
 * signature; see token-verifier.ts.
 */

import { decodeJwt, decodeProtectedHeader, errors } from 'jose';
import { ValidationError } from './errors.js';
import type { JwtHeader, TokenClaims } from './types.js';

export interface DecodedToken {
  header: Record<string, unknown>;
  payload: TokenClaims;
}

/**
 * Decode header and payload without any verification
 */
export function decodeToken(token: string): DecodedToken {
  let payload: TokenClaims;
  try {
    payload = decodeJwt(token);
  } catch (error) {
    if (error instanceof errors.JWTInvalid) {
      throw new ValidationError('invalid_token', `Malformed JWT: ${error.message}`, { cause: error });
    }
    throw error;
  }

  let header: Record<string, unknown>;
  try {
    header = { ...decodeProtectedHeader(token) };
  } catch (error) {
    if (error instanceof TypeError) {
      throw new ValidationError('invalid_token', 'Malformed JWT: header is not a base64url JSON object', {
        cause: error,
      });
    }
    throw error;
  }

  return { header, payload };
}

/**
 * Narrow a decoded header to the RS256 profile Kubernetes uses.
 */
export function requireSigningHeader(header: Record<string, unknown>): JwtHeader {
  const { kid, alg, typ } = header;
  if (typeof kid !== 'string' || kid.length === 0) {
    throw new ValidationError('invalid_token', 'JWT header is missing kid');
  }
  if (alg !== 'RS256') {
    throw new ValidationError('invalid_token', `Unsupported JWT algorithm: ${String(alg)}`);
  }
  return { ...header, kid, alg, typ: typeof typ === 'string' ? typ : undefined };
}

/**
 * Read an optional NumericDate claim. Absent is undefined; anything other
 * than a finite number is a malformed token.
 */
export function numericClaim(claims: TokenClaims, name: 'exp' | 'iat' | 'nbf'): number | undefined {
  const value = claims[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError('invalid_token', `JWT claim ${name} is not a number`);
  }
  return value;
}
