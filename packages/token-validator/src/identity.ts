/**
 * Identity canonicalization
 *
 * Canonical identities have the form `cluster/namespace/serviceaccount`.
 */

import { ValidationError } from './errors.js';
import type { KubernetesClaim, TokenClaims } from './types.js';

export const LOCAL_CLUSTER = 'local';

const SUBJECT_RE = /^system:serviceaccount:([^:]+):([^:]+)$/;

export interface RequestedIdentity {
  cluster: string;
  namespace: string;
  serviceAccount: string;
  /** True for `local/...` and for two-segment usernames */
  isLocal: boolean;
  /** `cluster/namespace/serviceaccount`, with `local` filled in */
  canonical: string;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function namedObject(value: unknown): { name?: string; uid?: string } | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  return { name: nonEmptyString(value.name), uid: nonEmptyString(value.uid) };
}

/**
 * The bound-token `kubernetes.io` claim, with fields of the wrong type dropped
 */
export function kubernetesClaim(payload: TokenClaims): KubernetesClaim | undefined {
  const claim = payload['kubernetes.io'];
  if (!isRecord(claim)) {
    return undefined;
  }
  return {
    ...claim,
    namespace: nonEmptyString(claim.namespace),
    serviceaccount: namedObject(claim.serviceaccount),
    pod: namedObject(claim.pod),
  };
}

/**
 * Namespace and service account name from dedicated claims: the bound-token
 * `kubernetes.io` object first, then the legacy flat claims.
 */
function serviceAccountClaims(payload: TokenClaims): { namespace: string; name: string } | null {
  const bound = kubernetesClaim(payload);
  const boundName = bound?.serviceaccount?.name;
  if (bound?.namespace && boundName) {
    return { namespace: bound.namespace, name: boundName };
  }

  const namespace = nonEmptyString(payload['kubernetes.io/serviceaccount/namespace']);
  const name = nonEmptyString(payload['kubernetes.io/serviceaccount/service-account.name']);
  if (namespace && name) {
    return { namespace, name };
  }
  return null;
}

/**
 * Map verified claims to `cluster/namespace/serviceaccount`.
 */
export function canonicalize(clusterName: string, payload: TokenClaims): string {
  const claims = serviceAccountClaims(payload);
  if (claims) {
    return `${clusterName}/${claims.namespace}/${claims.name}`;
  }

  const sub = nonEmptyString(payload.sub);
  if (sub) {
    const match = SUBJECT_RE.exec(sub);
    if (match) {
      return `${clusterName}/${match[1]}/${match[2]}`;
    }
    return `${clusterName}/${sub}`;
  }

  throw new ValidationError('extraction_failed', 'Unable to extract username from token claims');
}

/**
 * Parse a requested database username.
 *
 *   namespace/serviceaccount          -> local cluster
 *   local/namespace/serviceaccount    -> local cluster
 *   cluster/namespace/serviceaccount  -> cross-cluster
 */
export function parseUsername(username: string): RequestedIdentity {
  const parts = username.split('/');
  if (parts.some((part) => part.length === 0)) {
    throw new ValidationError('invalid_request', `Invalid username format '${username}'`);
  }

  if (parts.length === 2) {
    const [namespace, serviceAccount] = parts;
    return {
      cluster: LOCAL_CLUSTER,
      namespace,
      serviceAccount,
      isLocal: true,
      canonical: `${LOCAL_CLUSTER}/${namespace}/${serviceAccount}`,
    };
  }

  if (parts.length === 3) {
    const [cluster, namespace, serviceAccount] = parts;
    return {
      cluster,
      namespace,
      serviceAccount,
      isLocal: cluster === LOCAL_CLUSTER,
      canonical: username,
    };
  }

  throw new ValidationError(
    'invalid_request',
    `Invalid username format '${username}' (expected [cluster/]namespace/serviceaccount)`
  );
}
