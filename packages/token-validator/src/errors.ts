/**
 * Validation error taxonomy
 */

import type { ValidationFailure } from './types.js';

export const ERROR_KINDS = [
  'invalid_request',
  'cluster_not_found',
  'invalid_token',
  'invalid_signature',
  'token_expired',
  'discovery_failed',
  'jwks_fetch_failed',
  'extraction_failed',
  'identity_mismatch',
  'internal_error',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

const ERROR_STATUS: Record<ErrorKind, number> = {
  invalid_request: 400,
  cluster_not_found: 400,
  invalid_token: 401,
  invalid_signature: 401,
  token_expired: 401,
  extraction_failed: 401,
  identity_mismatch: 401,
  discovery_failed: 500,
  jwks_fetch_failed: 500,
  internal_error: 500,
};

export class ValidationError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

export function isErrorKind(value: unknown): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

/**
 * HTTP status the Validation API answers with for a given error kind
 */
export function httpStatusFor(kind: ErrorKind): number {
  return ERROR_STATUS[kind];
}

/**
 * Failures to obtain trust material. They do not prove a token invalid, and
 * they are the only kinds that may send the orchestrator to its fallback path.
 */
export function isTrustMaterialError(kind: ErrorKind): boolean {
  return kind === 'discovery_failed' || kind === 'jwks_fetch_failed';
}

export function failure(kind: ErrorKind, message: string): ValidationFailure {
  return { authenticated: false, error: kind, message };
}

/**
 * Convert anything thrown inside the engine into a failure result.
 * Non-ValidationError throwables are unexpected faults.
 */
export function toFailure(error: unknown): ValidationFailure {
  if (error instanceof ValidationError) {
    return failure(error.kind, error.message);
  }
  const message = error instanceof Error ? error.message : String(error);
  return failure('internal_error', `Unexpected error during validation: ${message}`);
}
