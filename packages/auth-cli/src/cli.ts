#!/usr/bin/env node

/**
 * kube-federated-auth CLI
 *
 * Validates Kubernetes ServiceAccount tokens for database login plugins.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { authenticateCommand } from './commands/authenticate.js';
import { clustersCommand } from './commands/clusters.js';
import { inspectCommand } from './commands/inspect.js';

const program = new Command();

program
  .name('kfa')
  .description('kube-federated-auth - Kubernetes ServiceAccount token validation')
  .version('0.1.0');

// Register commands
program.addCommand(authenticateCommand);
program.addCommand(inspectCommand);
program.addCommand(clustersCommand);

program.addHelpText(
  'after',
  `
Examples:
  # Authenticate a local ServiceAccount (token on stdin)
  $ kfa authenticate default/app < /var/run/secrets/kubernetes.io/serviceaccount/token

  # Authenticate a workload from another cluster through the central service
  $ KUBE_FEDERATED_AUTH_URL=http://kube-federated-auth:8080/validate \\
      kfa authenticate cluster-b/payments/api --token-file ./token

  # Decode a token without verifying it
  $ kfa inspect --token-file ./token --cluster cluster-b

  # List configured clusters
  $ kfa clusters
`
);

await program.parseAsync();
