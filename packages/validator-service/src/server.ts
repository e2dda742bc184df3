/**
 * kube-federated-auth Validation Service
 *
 * Validates Kubernetes ServiceAccount tokens from any configured cluster.
 */

import 'dotenv/config';
import { loadEngine } from '@kube-federated-auth/token-validator';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const engine = await loadEngine(config.engine);

  if (engine.registry.count() === 0) {
    console.error('[Server] No clusters configured: mount a ServiceAccount or set CLUSTER_CONFIG_PATH');
    process.exit(1);
  }

  const app = createApp(engine);
  const server = app.listen(config.port, () => {
    console.log(`[Server] Validation service listening on port ${config.port}`);
    console.log(`[Server] Trusted clusters: ${engine.registry.list().join(', ')}`);
  });

  process.on('SIGTERM', () => {
    console.log('[Server] SIGTERM received, closing server');
    server.close(() => {
      process.exit(0);
    });
  });
}

main().catch((error) => {
  console.error('[Server] Failed to start:', error);
  process.exit(1);
});
