/**
 * Cluster Registry
 *
 * Holds per-cluster trust configuration. Built once at startup from the
 * mounted ServiceAccount (the `local` entry) and a static YAML cluster file;
 * immutable afterwards. JSON files load too.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { load as parseYaml } from 'js-yaml';
import { z } from 'zod';
import { DEFAULT_MAX_TOKEN_TTL, DEFAULT_SERVICE_ACCOUNT_DIR } from './config.js';
import { LOCAL_CLUSTER } from './identity.js';
import { decodeToken } from './jwt.js';
import type { ClusterTrust } from './types.js';

export const IN_CLUSTER_API_SERVER = 'https://kubernetes.default.svc';

export const DEFAULT_CONFIG_PATHS = [
  '/etc/kube-federated-auth/clusters.yaml',
  '/etc/kube-federated-auth/clusters.json',
  join(process.cwd(), 'config', 'clusters.yaml'),
  join(process.cwd(), 'config', 'clusters.json'),
  join(process.cwd(), 'clusters.yaml'),
  join(process.cwd(), 'clusters.json'),
];

const clusterEntrySchema = z.object({
  name: z.string().min(1).optional(),
  issuer: z.string().min(1).optional(),
  api_server: z.string().url().optional(),
  ca_cert: z.string().min(1).optional(),
  ca_cert_path: z.string().min(1).optional(),
  token: z.string().min(1).optional(),
  token_path: z.string().min(1).optional(),
  jwks_uri: z.string().url().optional(),
  max_token_ttl: z.number().int().positive().optional(),
  auto: z.boolean().optional(),
});

export type ClusterEntry = z.infer<typeof clusterEntrySchema>;

export interface RegistryLoadOptions {
  /** Cluster file; when unset the first existing default path is used */
  configPath?: string;
  searchPaths?: string[];
  serviceAccountDir?: string;
  /** Default for entries without max_token_ttl */
  maxTokenTtl?: number;
}

export class ClusterRegistry {
  private readonly clusters: ReadonlyMap<string, Readonly<ClusterTrust>>;

  constructor(clusters: Iterable<ClusterTrust> = []) {
    const map = new Map<string, Readonly<ClusterTrust>>();
    for (const cluster of clusters) {
      map.set(cluster.name, Object.freeze({ ...cluster }));
    }
    this.clusters = map;
  }

  /**
   * Auto-detect the local cluster, then load the static cluster file
   */
  static async load(options: RegistryLoadOptions = {}): Promise<ClusterRegistry> {
    const maxTokenTtl = options.maxTokenTtl ?? DEFAULT_MAX_TOKEN_TTL;
    const clusters = new Map<string, ClusterTrust>();

    const local = await detectLocalCluster(options.serviceAccountDir ?? DEFAULT_SERVICE_ACCOUNT_DIR, maxTokenTtl);
    if (local) {
      clusters.set(local.name, local);
      console.log(`[ClusterRegistry] Auto-detected local cluster (issuer ${local.issuer})`);
    }

    const configPath = options.configPath ?? (options.searchPaths ?? DEFAULT_CONFIG_PATHS).find((p) => existsSync(p));
    if (configPath) {
      const content = await readFile(configPath, 'utf-8');
      applyClusterFile(clusters, content, configPath, maxTokenTtl);
    }

    const registry = new ClusterRegistry(clusters.values());
    console.log(`[ClusterRegistry] Loaded ${registry.count()} cluster(s): ${registry.list().join(', ')}`);
    return registry;
  }

  get(name: string): Readonly<ClusterTrust> | undefined {
    return this.clusters.get(name);
  }

  list(): string[] {
    return Array.from(this.clusters.keys());
  }

  count(): number {
    return this.clusters.size;
  }
}

/**
 * Synthesize the `local` entry from the pod's mounted ServiceAccount.
 *
 * The mounted token's `iss` is read without verification: it only tells us
 * which issuer to expect, it grants nothing.
 */
export async function detectLocalCluster(
  serviceAccountDir: string,
  maxTokenTtl: number = DEFAULT_MAX_TOKEN_TTL
): Promise<ClusterTrust | null> {
  const tokenPath = join(serviceAccountDir, 'token');
  const caCertPath = join(serviceAccountDir, 'ca.crt');

  if (!existsSync(tokenPath) || !existsSync(caCertPath)) {
    return null;
  }

  try {
    const token = (await readFile(tokenPath, 'utf-8')).trim();
    const { iss } = decodeToken(token).payload;
    if (typeof iss !== 'string' || iss.length === 0) {
      throw new Error('mounted token has no iss claim');
    }

    return {
      name: LOCAL_CLUSTER,
      issuer: iss,
      apiServer: IN_CLUSTER_API_SERVER,
      caCertPath,
      tokenPath,
      maxTokenTtl,
      auto: true,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ClusterRegistry] Failed to auto-detect local cluster: ${message}`);
    return null;
  }
}

function toTrust(entry: ClusterEntry & { name: string; issuer: string; api_server: string }, maxTokenTtl: number): ClusterTrust {
  return {
    name: entry.name,
    issuer: entry.issuer,
    apiServer: entry.api_server,
    caCert: entry.ca_cert,
    caCertPath: entry.ca_cert_path,
    token: entry.token,
    tokenPath: entry.token_path,
    jwksUri: entry.jwks_uri,
    maxTokenTtl: entry.max_token_ttl ?? maxTokenTtl,
  };
}

/**
 * Overrides from an `auto: true` entry, applied on top of the detected cluster
 */
function mergeAutoEntry(existing: ClusterTrust, entry: ClusterEntry): ClusterTrust {
  return {
    ...existing,
    issuer: entry.issuer ?? existing.issuer,
    apiServer: entry.api_server ?? existing.apiServer,
    caCert: entry.ca_cert ?? existing.caCert,
    caCertPath: entry.ca_cert_path ?? existing.caCertPath,
    token: entry.token ?? existing.token,
    tokenPath: entry.token_path ?? existing.tokenPath,
    jwksUri: entry.jwks_uri ?? existing.jwksUri,
    maxTokenTtl: entry.max_token_ttl ?? existing.maxTokenTtl,
  };
}

/**
 * Apply a cluster file to `clusters`.
 *
 * Entries are validated one by one: an invalid entry is logged and skipped,
 * the rest of the file still loads. A file that does not parse is an error.
 */
export function applyClusterFile(
  clusters: Map<string, ClusterTrust>,
  content: string,
  source: string,
  maxTokenTtl: number = DEFAULT_MAX_TOKEN_TTL
): void {
  let parsed: unknown;
  try {
    parsed = parseYaml(content, { filename: source });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Cluster config ${source} is not valid YAML: ${message}`, { cause: error });
  }

  const list = typeof parsed === 'object' && parsed !== null && 'clusters' in parsed ? parsed.clusters : undefined;
  if (!Array.isArray(list)) {
    console.warn(`[ClusterRegistry] No clusters found in ${source}`);
    return;
  }

  list.forEach((raw: unknown, index: number) => {
    const result = clusterEntrySchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || 'entry'}: ${i.message}`).join('; ');
      console.warn(`[ClusterRegistry] Skipping cluster #${index} in ${source}: ${issues}`);
      return;
    }
    const entry = result.data;

    if (entry.auto) {
      const name = entry.name ?? LOCAL_CLUSTER;
      const existing = clusters.get(name);
      if (existing?.auto) {
        clusters.set(name, mergeAutoEntry(existing, entry));
        console.log(`[ClusterRegistry] Updated auto-detected cluster: ${name}`);
      } else {
        console.warn(`[ClusterRegistry] Ignoring auto entry for ${name}: cluster was not auto-detected`);
      }
      return;
    }

    const { name, issuer, api_server } = entry;
    if (!name) {
      console.warn(`[ClusterRegistry] Skipping cluster #${index} in ${source}: missing name`);
      return;
    }
    if (!issuer || !api_server) {
      console.warn(`[ClusterRegistry] Skipping cluster ${name}: missing api_server or issuer`);
      return;
    }

    clusters.set(name, toTrust({ ...entry, name, issuer, api_server }, maxTokenTtl));
    console.log(`[ClusterRegistry] Loaded cluster: ${name}`);
  });
}
