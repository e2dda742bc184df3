/**
 * Authenticate command
 *
 * Entry point for database authentication plugins: validates a token for a
 * requested username and prints the result as JSON on stdout. Exit code 0
 * means accepted.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadEngine, ValidationOrchestrator } from '@kube-federated-auth/token-validator';
import { ValidatorClient } from '@kube-federated-auth/validator-client';
import { loadCliConfig } from '../config.js';
import { processOutput, withDiagnosticsOnStderr, type CliOutput } from '../io.js';
import { readToken, type TokenSourceOptions } from '../token-source.js';

interface AuthenticateOptions extends TokenSourceOptions {
  verbose?: boolean;
}

/**
 * Run the orchestrator and report. Returns the process exit code.
 */
export async function runAuthenticate(
  orchestrator: Pick<ValidationOrchestrator, 'authenticate'>,
  username: string,
  token: string,
  output: CliOutput,
  verbose = false
): Promise<number> {
  const outcome = await orchestrator.authenticate(username, token);
  output.out(JSON.stringify(outcome.result));

  if (verbose) {
    output.err(chalk.gray(`States: ${outcome.states.join(' -> ')}`));
  }

  if (outcome.result.authenticated) {
    output.err(chalk.green(`✓ Authenticated as ${outcome.result.username} (${outcome.path ?? 'unknown'} path)`));
    return 0;
  }

  output.err(chalk.red(`✗ ${outcome.result.error}: ${outcome.result.message}`));
  return 1;
}

async function authenticateAction(username: string, options: AuthenticateOptions): Promise<void> {
  try {
    const config = loadCliConfig();
    const token = await readToken(options);
    const engine = await loadEngine(config.engine);
    const central = config.validatorUrl
      ? new ValidatorClient({ validatorUrl: config.validatorUrl, timeoutMs: config.validatorTimeoutMs })
      : undefined;

    const orchestrator = new ValidationOrchestrator({
      local: engine.validator,
      central,
      registry: engine.registry,
      defaultMaxTokenTtl: config.engine.maxTokenTtl,
    });

    process.exitCode = await runAuthenticate(orchestrator, username, token, processOutput, options.verbose);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    processOutput.out(JSON.stringify({ authenticated: false, error: 'internal_error', message }));
    processOutput.err(chalk.red(`Error: ${message}`));
    process.exitCode = 1;
  }
}

export const authenticateCommand = new Command('authenticate')
  .description('Validate a ServiceAccount token for a database username')
  .argument('<username>', 'Requested username: [cluster/]namespace/serviceaccount')
  .option('--token <jwt>', 'Token to validate (default: read from stdin)')
  .option('--token-file <path>', 'Read the token from a file')
  .option('-v, --verbose', 'Print the orchestrator state trace')
  .action((username: string, options: AuthenticateOptions) =>
    withDiagnosticsOnStderr(() => authenticateAction(username, options))
  );
