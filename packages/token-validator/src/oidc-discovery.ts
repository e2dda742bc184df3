/**
 * OIDC Discovery Client
 *
 * Resolves a cluster's JWKS URI from its issuer. No caching here; the JWKS
 * cache owns discovery results.
 */

import { ValidationError } from './errors.js';
import { outboundOptions, type HttpClient, type HttpJsonResponse } from './http.js';
import type { ClusterTrust } from './types.js';

const WELL_KNOWN_PATH = '.well-known/openid-configuration';

export function discoveryUrl(issuer: string): string {
  return issuer.endsWith('/') ? `${issuer}${WELL_KNOWN_PATH}` : `${issuer}/${WELL_KNOWN_PATH}`;
}

export class OIDCDiscoveryClient {
  constructor(
    private readonly http: HttpClient,
    private readonly timeoutMs: number = 5000
  ) {}

  /**
   * Fetch `<issuer>/.well-known/openid-configuration` and return its jwks_uri
   */
  async discover(trust: ClusterTrust, signal?: AbortSignal): Promise<string> {
    const url = discoveryUrl(trust.issuer);
    const options = await outboundOptions(trust, this.timeoutMs, signal);

    let response: HttpJsonResponse;
    try {
      response = await this.http.getJson(url, options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[OIDCDiscovery] Failed to fetch ${url}: ${message}`);
      throw new ValidationError('discovery_failed', `OIDC discovery failed for cluster ${trust.name}: ${message}`, {
        cause: error,
      });
    }

    if (response.status !== 200) {
      throw new ValidationError(
        'discovery_failed',
        `OIDC discovery for cluster ${trust.name} returned HTTP ${response.status}`
      );
    }

    const { body } = response;
    const jwksUri = typeof body === 'object' && body !== null && 'jwks_uri' in body ? body.jwks_uri : undefined;
    if (typeof jwksUri !== 'string' || jwksUri.length === 0) {
      throw new ValidationError(
        'discovery_failed',
        `OIDC discovery for cluster ${trust.name} returned no jwks_uri`
      );
    }

    console.log(`[OIDCDiscovery] Cluster ${trust.name}: JWKS URI ${jwksUri}`);
    return jwksUri;
  }
}
