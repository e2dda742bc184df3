/**
 * Validation Orchestrator
 *
 * Decides how a database login is validated:
 *
 *   PARSE_USERNAME -> SELECT_PATH -> API_PATH | FALLBACK_PATH
 *                  -> TTL_CHECK -> RECONCILE -> DONE | FAIL
 *
 * The central validation endpoint is tried first when configured. Only an
 * unavailable endpoint (transport failure or missing trust material) moves
 * to FALLBACK_PATH; any rejection is final. The fallback validates against
 * the local cluster only.
 */

import { DEFAULT_MAX_TOKEN_TTL } from './config.js';
import { failure, toFailure } from './errors.js';
import { LOCAL_CLUSTER, parseUsername, type RequestedIdentity } from './identity.js';
import { enforceMaxLifetime, type TokenValidator } from './token-validator.js';
import type { ClusterRegistry } from './cluster-registry.js';
import type { ValidationFailure, ValidationResult, ValidationSuccess } from './types.js';

export type OrchestratorState =
  | 'PARSE_USERNAME'
  | 'SELECT_PATH'
  | 'API_PATH'
  | 'FALLBACK_PATH'
  | 'TTL_CHECK'
  | 'RECONCILE'
  | 'DONE'
  | 'FAIL';

const TRANSITIONS: Record<OrchestratorState, readonly OrchestratorState[]> = {
  PARSE_USERNAME: ['SELECT_PATH', 'FAIL'],
  SELECT_PATH: ['API_PATH', 'FALLBACK_PATH'],
  API_PATH: ['TTL_CHECK', 'FALLBACK_PATH', 'FAIL'],
  FALLBACK_PATH: ['TTL_CHECK', 'FAIL'],
  TTL_CHECK: ['RECONCILE', 'FAIL'],
  RECONCILE: ['DONE', 'FAIL'],
  DONE: [],
  FAIL: [],
};

/**
 * Outcome of asking the central validation endpoint
 */
export type CentralOutcome =
  | { status: 'accepted'; result: ValidationSuccess }
  | { status: 'rejected'; result: ValidationFailure }
  | { status: 'unavailable'; reason: string };

export interface CentralValidator {
  validate(cluster: string, token: string, signal?: AbortSignal): Promise<CentralOutcome>;
}

export type ValidationPath = 'api' | 'fallback';

export interface OrchestratorResult {
  result: ValidationResult;
  /** Path that produced the verified identity, if one did */
  path?: ValidationPath;
  /** Visited states, in order */
  states: OrchestratorState[];
}

export interface OrchestratorOptions {
  /** Local engine used on the fallback path */
  local: Pick<TokenValidator, 'validate'>;
  central?: CentralValidator;
  /** Source of per-cluster max_token_ttl */
  registry?: Pick<ClusterRegistry, 'get'>;
  defaultMaxTokenTtl?: number;
}

class Run {
  readonly states: OrchestratorState[] = ['PARSE_USERNAME'];
  path?: ValidationPath;

  get state(): OrchestratorState {
    return this.states[this.states.length - 1];
  }

  move(next: OrchestratorState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal orchestrator transition ${this.state} -> ${next}`);
    }
    this.states.push(next);
  }

  fail(result: ValidationFailure): OrchestratorResult {
    this.move('FAIL');
    return { result, path: this.path, states: this.states };
  }

  done(result: ValidationSuccess): OrchestratorResult {
    this.move('DONE');
    return { result, path: this.path, states: this.states };
  }
}

export class ValidationOrchestrator {
  private readonly local: Pick<TokenValidator, 'validate'>;
  private readonly central?: CentralValidator;
  private readonly registry?: Pick<ClusterRegistry, 'get'>;
  private readonly defaultMaxTokenTtl: number;

  constructor(options: OrchestratorOptions) {
    this.local = options.local;
    this.central = options.central;
    this.registry = options.registry;
    this.defaultMaxTokenTtl = options.defaultMaxTokenTtl ?? DEFAULT_MAX_TOKEN_TTL;
  }

  /**
   * Authenticate `username` ([cluster/]namespace/serviceaccount) with `token`
   */
  async authenticate(username: string, token: string, signal?: AbortSignal): Promise<OrchestratorResult> {
    const run = new Run();
    try {
      const outcome = await this.run(run, username, token, signal);
      if (!outcome.result.authenticated) {
        console.warn(`[Orchestrator] Authentication failed for '${username}': ${outcome.result.error} - ${outcome.result.message}`);
      } else {
        console.log(`[Orchestrator] Authentication successful for ${outcome.result.username} (${outcome.path})`);
      }
      return outcome;
    } catch (error) {
      console.error(`[Orchestrator] Unexpected error authenticating '${username}':`, error);
      return {
        result: toFailure(error),
        path: run.path,
        states: run.state === 'FAIL' ? run.states : [...run.states, 'FAIL'],
      };
    }
  }

  private async run(run: Run, username: string, token: string, signal?: AbortSignal): Promise<OrchestratorResult> {
    // PARSE_USERNAME
    let requested: RequestedIdentity;
    try {
      requested = parseUsername(username);
    } catch (error) {
      return run.fail(toFailure(error));
    }
    run.move('SELECT_PATH');

    let verified: ValidationSuccess | undefined;

    if (this.central) {
      run.move('API_PATH');
      const outcome = await this.central.validate(requested.cluster, token, signal);
      if (outcome.status === 'rejected') {
        return run.fail(outcome.result);
      }
      if (outcome.status === 'accepted') {
        verified = outcome.result;
        run.path = 'api';
      } else {
        console.warn(`[Orchestrator] Central validation unavailable (${outcome.reason}), attempting fallback`);
      }
    }

    if (!verified) {
      run.move('FALLBACK_PATH');
      if (!requested.isLocal) {
        return run.fail(
          failure(
            'cluster_not_found',
            `Cannot validate token for cluster ${requested.cluster}: cross-cluster validation requires the central endpoint`
          )
        );
      }
      const local = await this.local.validate(LOCAL_CLUSTER, token, signal);
      if (!local.authenticated) {
        return run.fail(local);
      }
      verified = local;
      run.path = 'fallback';
    }

    run.move('TTL_CHECK');
    try {
      enforceMaxLifetime(verified.expiration, verified.issued_at, this.maxTokenTtlFor(requested.cluster));
    } catch (error) {
      return run.fail(toFailure(error));
    }

    run.move('RECONCILE');
    if (verified.username !== requested.canonical) {
      return run.fail(
        failure('identity_mismatch', `Username mismatch: expected '${requested.canonical}', got '${verified.username}'`)
      );
    }

    return run.done(verified);
  }

  private maxTokenTtlFor(cluster: string): number {
    return this.registry?.get(cluster)?.maxTokenTtl ?? this.defaultMaxTokenTtl;
  }
}
