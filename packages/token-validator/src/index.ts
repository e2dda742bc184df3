// Types
export type {
  ClusterTrust,
  Clock,
  JwtHeader,
  KubernetesClaim,
  ParsedToken,
  PublishedJwk,
  TokenClaims,
  ValidationFailure,
  ValidationResult,
  ValidationSuccess,
} from './types.js';
export { systemClock } from './types.js';

// Errors
export type { ErrorKind } from './errors.js';
export {
  ERROR_KINDS,
  ValidationError,
  failure,
  httpStatusFor,
  isErrorKind,
  isTrustMaterialError,
  toFailure,
} from './errors.js';

// Configuration
export type { EngineConfig } from './config.js';
export {
  DEFAULT_MAX_TOKEN_TTL,
  DEFAULT_SERVICE_ACCOUNT_DIR,
  loadEngineConfig,
  readBoolEnv,
  readIntEnv,
} from './config.js';

// Token structure and identity
export type { DecodedToken } from './jwt.js';
export { decodeToken, numericClaim, requireSigningHeader } from './jwt.js';
export type { RequestedIdentity } from './identity.js';
export { LOCAL_CLUSTER, canonicalize, kubernetesClaim, parseUsername } from './identity.js';

// Trust material
export type { ClusterEntry, RegistryLoadOptions } from './cluster-registry.js';
export {
  ClusterRegistry,
  DEFAULT_CONFIG_PATHS,
  IN_CLUSTER_API_SERVER,
  applyClusterFile,
  detectLocalCluster,
} from './cluster-registry.js';
export type { HttpClient, HttpGetOptions, HttpJsonResponse } from './http.js';
export { NodeHttpClient, outboundOptions } from './http.js';
export { OIDCDiscoveryClient, discoveryUrl } from './oidc-discovery.js';
export type { JWKSCacheOptions, KeySet } from './jwks-cache.js';
export { JWKSCacheManager, rsaKeyFromJwk } from './jwks-cache.js';

// Validation
export type { KeyResolver, TokenVerifierOptions } from './token-verifier.js';
export { TokenVerifier } from './token-verifier.js';
export { TokenValidator, enforceMaxLifetime } from './token-validator.js';
export type {
  CentralOutcome,
  CentralValidator,
  OrchestratorOptions,
  OrchestratorResult,
  OrchestratorState,
  ValidationPath,
} from './orchestrator.js';
export { ValidationOrchestrator } from './orchestrator.js';
export type { Engine, EngineDeps } from './engine.js';
export { createEngine, loadEngine } from './engine.js';
