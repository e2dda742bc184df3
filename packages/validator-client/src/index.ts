// Types
export type { ValidatorClientOptions, ValidateRequestBody } from './types.js';
export type { CentralOutcome, CentralValidator } from '@kube-federated-auth/token-validator';

// Core client
export { ValidatorClient } from './client.js';
