/**
 * Type definitions for the token validation engine
 */

import type { ErrorKind } from './errors.js';

/**
 * Trust configuration for one Kubernetes cluster.
 *
 * Trust is keyed by `name`, never by `issuer`: default issuers are not unique
 * across clusters.
 */
export interface ClusterTrust {
  name: string;
  issuer: string;
  apiServer: string;
  /** PEM bundle used to verify the cluster's TLS certificate */
  caCert?: string;
  caCertPath?: string;
  /** Bootstrap bearer credential for discovery and JWKS calls */
  token?: string;
  tokenPath?: string;
  /** Static JWKS URI; skips OIDC discovery when set */
  jwksUri?: string;
  /** Maximum allowed `exp - iat`, in seconds */
  maxTokenTtl: number;
  /** True for the entry synthesized from the mounted ServiceAccount */
  auto?: boolean;
}

export interface JwtHeader {
  alg: string;
  kid: string;
  typ?: string;
  [param: string]: unknown;
}

/**
 * Kubernetes bound-token claim (`kubernetes.io`)
 */
export interface KubernetesClaim {
  namespace?: string;
  serviceaccount?: { name?: string; uid?: string };
  pod?: { name?: string; uid?: string };
  [field: string]: unknown;
}

export interface TokenClaims {
  iss?: unknown;
  sub?: unknown;
  aud?: unknown;
  exp?: unknown;
  iat?: unknown;
  nbf?: unknown;
  'kubernetes.io'?: unknown;
  'kubernetes.io/serviceaccount/namespace'?: unknown;
  'kubernetes.io/serviceaccount/service-account.name'?: unknown;
  [claim: string]: unknown;
}

export interface ParsedToken {
  header: JwtHeader;
  payload: TokenClaims;
  /** Numeric `exp`, if present */
  expiration?: number;
  /** Numeric `iat`, if present */
  issuedAt?: number;
}

/**
 * A key as published in a JWKS document
 */
export interface PublishedJwk {
  kty?: string;
  kid?: string;
  use?: string;
  alg?: string;
  n?: string;
  e?: string;
  [param: string]: unknown;
}

export interface ValidationSuccess {
  authenticated: true;
  username: string;
  expiration: number | null;
  issued_at: number | null;
}

export interface ValidationFailure {
  authenticated: false;
  error: ErrorKind;
  message: string;
}

export type ValidationResult = ValidationSuccess | ValidationFailure;

/**
 * Monotonic enough for token checks; returns epoch seconds.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
