export { loadCliConfig, type CliConfig } from './config.js';
export { processOutput, withDiagnosticsOnStderr, type CliOutput } from './io.js';
export { readToken, type TokenSourceOptions } from './token-source.js';
export { authenticateCommand, runAuthenticate } from './commands/authenticate.js';
export { clustersCommand, formatCluster } from './commands/clusters.js';
export { describeToken, inspectCommand, type TokenDescription } from './commands/inspect.js';
