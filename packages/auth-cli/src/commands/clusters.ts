/**
 * Clusters command
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ClusterRegistry, type ClusterTrust } from '@kube-federated-auth/token-validator';
import { loadCliConfig } from '../config.js';
import { processOutput, withDiagnosticsOnStderr } from '../io.js';

/**
 * One line per cluster. Credentials are never shown, only where they come from.
 */
export function formatCluster(trust: Readonly<ClusterTrust>): string {
  const credential = trust.token ? 'inline token' : trust.tokenPath ? trust.tokenPath : 'none';
  const keys = trust.jwksUri ? `jwks ${trust.jwksUri}` : 'discovery';
  const auto = trust.auto ? ' (auto-detected)' : '';
  return `${trust.name}${auto}  issuer=${trust.issuer}  api=${trust.apiServer}  keys=${keys}  credential=${credential}  max_ttl=${trust.maxTokenTtl}s`;
}

interface ClustersOptions {
  json?: boolean;
}

async function clustersAction(options: ClustersOptions): Promise<void> {
  try {
    const config = loadCliConfig();
    const registry = await ClusterRegistry.load({
      configPath: config.engine.clusterConfigPath,
      serviceAccountDir: config.engine.serviceAccountDir,
      maxTokenTtl: config.engine.maxTokenTtl,
    });

    if (options.json) {
      processOutput.out(JSON.stringify({ clusters: registry.list(), count: registry.count() }));
      return;
    }

    if (registry.count() === 0) {
      processOutput.err(chalk.yellow('No clusters configured. Mount a ServiceAccount or set CLUSTER_CONFIG_PATH.'));
      return;
    }

    processOutput.err(chalk.blue.bold(`Configured clusters (${registry.count()})`));
    for (const name of registry.list()) {
      const trust = registry.get(name);
      if (trust) {
        processOutput.out(formatCluster(trust));
      }
    }
  } catch (error) {
    processOutput.err(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  }
}

export const clustersCommand = new Command('clusters')
  .description('List the locally configured clusters')
  .option('--json', 'Print cluster names as JSON')
  .action((options: ClustersOptions) => withDiagnosticsOnStderr(() => clustersAction(options)));
