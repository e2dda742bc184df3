import { describe, it, expect } from 'vitest';
import { formatCluster } from './clusters.js';

describe('formatCluster', () => {
  it('describes an auto-detected cluster', () => {
    expect(
      formatCluster({
        name: 'local',
        issuer: 'https://kubernetes.default.svc.cluster.local',
        apiServer: 'https://kubernetes.default.svc',
        caCertPath: '/var/run/secrets/kubernetes.io/serviceaccount/ca.crt',
        tokenPath: '/var/run/secrets/kubernetes.io/serviceaccount/token',
        maxTokenTtl: 3600,
        auto: true,
      })
    ).toBe(
      'local (auto-detected)  issuer=https://kubernetes.default.svc.cluster.local  api=https://kubernetes.default.svc  keys=discovery  credential=/var/run/secrets/kubernetes.io/serviceaccount/token  max_ttl=3600s'
    );
  });

  it('never prints an inline credential', () => {
    const line = formatCluster({
      name: 'cluster-b',
      issuer: 'https://b.example.com',
      apiServer: 'https://api.b.example.com',
      token: 'test-secret',
      jwksUri: 'https://b.example.com/jwks',
      maxTokenTtl: 900,
    });

    expect(line).toBe(
      'cluster-b  issuer=https://b.example.com  api=https://api.b.example.com  keys=jwks https://b.example.com/jwks  credential=inline token  max_ttl=900s'
    );
  });
});
