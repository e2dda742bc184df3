import { describe, it, expect } from 'vitest';
import { describeToken } from './inspect.js';

function unsignedToken(claims: Record<string, unknown>): string {
  const encode = (value: unknown) => Buffer.from(JSON.stringify(value)).toString('base64url');
  return `${encode({ alg: 'RS256', kid: 'key-1' })}.${encode(claims)}.c2lnbmF0dXJl`;
}

describe('describeToken', () => {
  const now = () => 1700000000;

  it('decodes claims and derives the identity for the cluster', () => {
    const token = unsignedToken({
      iss: 'https://kubernetes.default.svc',
      sub: 'system:serviceaccount:default:app',
      iat: 1699999000,
      exp: 1700003600,
    });

    expect(describeToken(token, 'cluster-b', now)).toEqual({
      header: { alg: 'RS256', kid: 'key-1' },
      payload: {
        iss: 'https://kubernetes.default.svc',
        sub: 'system:serviceaccount:default:app',
        iat: 1699999000,
        exp: 1700003600,
      },
      identity: 'cluster-b/default/app',
      expiresAt: '2023-11-14T23:13:20.000Z',
      issuedAt: '2023-11-14T21:56:40.000Z',
      expired: false,
    });
  });

  it('flags expired tokens', () => {
    const description = describeToken(unsignedToken({ sub: 'robot', exp: 1699999999 }), 'local', now);

    expect(description.expired).toBe(true);
    expect(description.identity).toBe('local/robot');
  });

  it('reports a null identity when no claims identify the workload', () => {
    const description = describeToken(unsignedToken({ iss: 'x' }), 'local', now);

    expect(description.identity).toBeNull();
    expect(description.expiresAt).toBeNull();
    expect(description.expired).toBe(false);
  });

  it('rejects malformed tokens', () => {
    expect(() => describeToken('not-a-token', 'local', now)).toThrow(/Malformed JWT/);
  });
});
