/**
 * Inspect command
 *
 * Decodes a token WITHOUT verifying it. For debugging only.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  LOCAL_CLUSTER,
  canonicalize,
  decodeToken,
  numericClaim,
  systemClock,
  ValidationError,
  type Clock,
  type TokenClaims,
} from '@kube-federated-auth/token-validator';
import { processOutput, withDiagnosticsOnStderr } from '../io.js';
import { readToken, type TokenSourceOptions } from '../token-source.js';

export interface TokenDescription {
  header: Record<string, unknown>;
  payload: TokenClaims;
  /** Identity the claims map to, or null when none can be extracted */
  identity: string | null;
  expiresAt: string | null;
  issuedAt: string | null;
  expired: boolean;
}

function isoTime(seconds: number | undefined): string | null {
  return seconds === undefined ? null : new Date(seconds * 1000).toISOString();
}

export function describeToken(token: string, cluster: string, now: Clock = systemClock): TokenDescription {
  const { header, payload } = decodeToken(token);
  const exp = numericClaim(payload, 'exp');
  const iat = numericClaim(payload, 'iat');

  let identity: string | null = null;
  try {
    identity = canonicalize(cluster, payload);
  } catch (error) {
    if (!(error instanceof ValidationError)) {
      throw error;
    }
  }

  return {
    header,
    payload,
    identity,
    expiresAt: isoTime(exp),
    issuedAt: isoTime(iat),
    expired: exp !== undefined && exp < now(),
  };
}

interface InspectOptions extends TokenSourceOptions {
  cluster: string;
}

async function inspectAction(options: InspectOptions): Promise<void> {
  try {
    const description = describeToken(await readToken(options), options.cluster);

    processOutput.err(chalk.yellow('⚠ Signature NOT verified'));
    processOutput.out(JSON.stringify(description, null, 2));

    if (description.identity) {
      processOutput.err(chalk.cyan(`Identity: ${description.identity}`));
    } else {
      processOutput.err(chalk.red('Identity: no ServiceAccount claims found'));
    }
    if (description.expired) {
      processOutput.err(chalk.red(`Expired at ${description.expiresAt}`));
    }
  } catch (error) {
    processOutput.err(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  }
}

export const inspectCommand = new Command('inspect')
  .description('Decode a token without verifying it')
  .option('--token <jwt>', 'Token to decode (default: read from stdin)')
  .option('--token-file <path>', 'Read the token from a file')
  .option('--cluster <name>', 'Cluster name used for the canonical identity', LOCAL_CLUSTER)
  .action((options: InspectOptions) => withDiagnosticsOnStderr(() => inspectAction(options)));
