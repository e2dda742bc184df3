/**
 * Outbound HTTP for discovery and JWKS retrieval
 *
 * Cluster API servers usually present certificates signed by a private CA and
 * require a bearer token, so requests go through node:https with per-cluster
 * TLS material instead of the global fetch.
 */

import { request as httpRequest, type IncomingMessage } from 'node:http';
import { request as httpsRequest } from 'node:https';
import { readFile } from 'node:fs/promises';
import { URL } from 'node:url';
import type { ClusterTrust } from './types.js';

const MAX_RESPONSE_BYTES = 1024 * 1024;

export interface HttpGetOptions {
  /** PEM bundle trusted for this request */
  ca?: string;
  bearerToken?: string;
  accept?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface HttpJsonResponse {
  status: number;
  /** Parsed body, or undefined when the body is not JSON */
  body: unknown;
}

export interface HttpClient {
  getJson(url: string, options: HttpGetOptions): Promise<HttpJsonResponse>;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class NodeHttpClient implements HttpClient {
  getJson(url: string, options: HttpGetOptions): Promise<HttpJsonResponse> {
    const target = new URL(url);
    if (target.protocol !== 'https:' && target.protocol !== 'http:') {
      return Promise.reject(new Error(`Unsupported URL scheme ${target.protocol}`));
    }

    const headers: Record<string, string> = {
      Accept: options.accept ?? 'application/json',
      'User-Agent': 'kube-federated-auth/0.1.0',
    };
    if (options.bearerToken) {
      headers['Authorization'] = `Bearer ${options.bearerToken}`;
    }

    return new Promise((resolve, reject) => {
      const onResponse = (res: IncomingMessage) => {
        const chunks: Buffer[] = [];
        let size = 0;

        res.on('data', (chunk: Buffer) => {
          size += chunk.length;
          if (size > MAX_RESPONSE_BYTES) {
            req.destroy(new Error(`Response from ${target.host} exceeds ${MAX_RESPONSE_BYTES} bytes`));
            return;
          }
          chunks.push(chunk);
        });
        res.on('end', () => {
          clearTimeout(timer);
          resolve({
            status: res.statusCode ?? 0,
            body: parseJson(Buffer.concat(chunks).toString('utf-8')),
          });
        });
        res.on('error', (err) => {
          clearTimeout(timer);
          reject(err);
        });
      };

      const req = target.protocol === 'https:'
        ? httpsRequest(target, { method: 'GET', headers, ca: options.ca, signal: options.signal }, onResponse)
        : httpRequest(target, { method: 'GET', headers, signal: options.signal }, onResponse);

      const timer = setTimeout(() => {
        req.destroy(new Error(`Request to ${target.host} timed out after ${options.timeoutMs}ms`));
      }, options.timeoutMs);

      req.on('error', (err) => {
        clearTimeout(timer);
        reject(err);
      });
      req.end();
    });
  }
}

async function readTrimmed(path: string, what: string, cluster: string): Promise<string | undefined> {
  try {
    return (await readFile(path, 'utf-8')).trim();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[HTTP] Cannot read ${what} for cluster ${cluster} from ${path}: ${message}`);
    return undefined;
  }
}

/**
 * Build request options for a cluster. Credential files are read on every
 * call so rotated projected tokens are picked up.
 */
export async function outboundOptions(
  trust: ClusterTrust,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<HttpGetOptions> {
  const ca = trust.caCert ?? (trust.caCertPath ? await readTrimmed(trust.caCertPath, 'CA bundle', trust.name) : undefined);
  const bearerToken = trust.token ?? (trust.tokenPath ? await readTrimmed(trust.tokenPath, 'bootstrap token', trust.name) : undefined);

  return { ca, bearerToken, timeoutMs, signal };
}
