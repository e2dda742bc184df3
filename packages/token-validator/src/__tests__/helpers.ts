/**
 * Shared fixtures for token-validator tests: RSA test keys, locally signed
 * tokens and an in-process HTTP client.
 */

import { generateKeyPairSync, sign, type KeyObject } from 'node:crypto';
import type { HttpClient, HttpGetOptions, HttpJsonResponse } from '../http.js';
import type { ClusterTrust, PublishedJwk } from '../types.js';

export interface TestKey {
  kid: string;
  privateKey: KeyObject;
  publicKey: KeyObject;
  jwk: PublishedJwk;
}

export function createTestKey(kid: string): TestKey {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
  const exported = publicKey.export({ format: 'jwk' });
  return {
    kid,
    privateKey,
    publicKey,
    jwk: { kty: 'RSA', kid, use: 'sig', alg: 'RS256', n: exported.n, e: exported.e },
  };
}

export function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), 'utf-8').toString('base64url');
}

/**
 * Sign `payload` as an RS256 compact JWS. `header` entries override the
 * defaults (alg RS256, kid of the key).
 */
export function signToken(
  payload: Record<string, unknown>,
  key: TestKey,
  header: Record<string, unknown> = {}
): string {
  const headerSegment = encodeSegment({ alg: 'RS256', kid: key.kid, ...header });
  const payloadSegment = encodeSegment(payload);
  const signature = sign('sha256', Buffer.from(`${headerSegment}.${payloadSegment}`, 'utf-8'), key.privateKey);
  return `${headerSegment}.${payloadSegment}.${signature.toString('base64url')}`;
}

/**
 * Claims of a bound ServiceAccount token
 */
export function serviceAccountClaims(
  issuer: string,
  namespace: string,
  name: string,
  times: { iat?: number; exp?: number } = {}
): Record<string, unknown> {
  return {
    iss: issuer,
    sub: `system:serviceaccount:${namespace}:${name}`,
    aud: ['https://kubernetes.default.svc'],
    ...times,
    'kubernetes.io': {
      namespace,
      serviceaccount: { name, uid: '00000000-0000-0000-0000-000000000001' },
    },
  };
}

export function testCluster(overrides: Partial<ClusterTrust> = {}): ClusterTrust {
  return {
    name: 'cluster-a',
    issuer: 'https://cluster-a.example.com',
    apiServer: 'https://cluster-a.example.com',
    maxTokenTtl: 3600,
    ...overrides,
  };
}

type Handler = (options: HttpGetOptions) => HttpJsonResponse | Promise<HttpJsonResponse>;

/**
 * HttpClient answering from registered handlers. Unregistered URLs fail the
 * way a refused connection does.
 */
export class FakeHttpClient implements HttpClient {
  readonly calls: Array<{ url: string; options: HttpGetOptions }> = [];
  private readonly handlers = new Map<string, Handler>();

  on(url: string, handler: Handler): this {
    this.handlers.set(url, handler);
    return this;
  }

  json(url: string, body: unknown, status = 200): this {
    return this.on(url, () => ({ status, body }));
  }

  callsTo(url: string): number {
    return this.calls.filter((call) => call.url === url).length;
  }

  async getJson(url: string, options: HttpGetOptions): Promise<HttpJsonResponse> {
    this.calls.push({ url, options });
    const handler = this.handlers.get(url);
    if (!handler) {
      throw new Error(`connect ECONNREFUSED ${url}`);
    }
    return handler(options);
  }
}

/**
 * Kind of the ValidationError thrown by `fn`, or the thrown value's message
 */
export async function thrownKind(fn: () => unknown): Promise<string> {
  try {
    await fn();
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'kind' in error && typeof error.kind === 'string') {
      return error.kind;
    }
    return error instanceof Error ? error.message : String(error);
  }
  return 'no error';
}
