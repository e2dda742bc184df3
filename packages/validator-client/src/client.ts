import {
  failure,
  isErrorKind,
  isTrustMaterialError,
  type CentralOutcome,
  type CentralValidator,
} from '@kube-federated-auth/token-validator';
import type { ValidateRequestBody, ValidatorClientOptions } from './types.js';

/**
 * Default timeout in milliseconds
 */
const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Gateway statuses meaning the validation service itself was not reached
 */
const UNAVAILABLE_STATUSES = new Set([502, 503, 504]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nullableNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Client for a centralized token validation service.
 *
 * Answers are classified for the orchestrator: `accepted`, `rejected`
 * (final), or `unavailable` (the caller may fall back to local validation).
 *
 * @example
 * ```typescript
 * const client = new ValidatorClient({ validatorUrl: 'http://kube-federated-auth:8080/validate' });
 * const outcome = await client.validate('cluster-b', token);
 * if (outcome.status === 'accepted') {
 *   console.log(outcome.result.username);
 * }
 * ```
 */
export class ValidatorClient implements CentralValidator {
  private readonly validatorUrl: string;
  private readonly timeoutMs: number;

  constructor(options: ValidatorClientOptions) {
    this.validatorUrl = options.validatorUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async validate(cluster: string, token: string, signal?: AbortSignal): Promise<CentralOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    const payload: ValidateRequestBody = { cluster, token };

    try {
      const response = await fetch(this.validatorUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (UNAVAILABLE_STATUSES.has(response.status)) {
        return { status: 'unavailable', reason: `Validator returned HTTP ${response.status}` };
      }

      const text = await response.text();
      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch {
        return {
          status: 'rejected',
          result: failure('internal_error', `Validator ${response.status}: ${text.slice(0, 200)}`),
        };
      }

      return this.classify(response.ok, response.status, data);
    } catch (error) {
      if (signal?.aborted) {
        return { status: 'rejected', result: failure('internal_error', 'Validation aborted by caller') };
      }
      if (error instanceof Error && error.name === 'AbortError') {
        return { status: 'unavailable', reason: `Validator timeout after ${this.timeoutMs}ms` };
      }
      return {
        status: 'unavailable',
        reason: error instanceof Error ? error.message : 'Unknown validator error',
      };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private classify(ok: boolean, status: number, data: unknown): CentralOutcome {
    if (ok) {
      if (isRecord(data) && data.authenticated === true && typeof data.username === 'string') {
        return {
          status: 'accepted',
          result: {
            authenticated: true,
            username: data.username,
            expiration: nullableNumber(data.expiration),
            issued_at: nullableNumber(data.issued_at),
          },
        };
      }
      return {
        status: 'rejected',
        result: failure('internal_error', 'Validator returned success without an authenticated username'),
      };
    }

    const kind = isRecord(data) ? data.error : undefined;
    const message = isRecord(data) && typeof data.message === 'string' ? data.message : `Validator returned HTTP ${status}`;
    if (!isErrorKind(kind)) {
      return { status: 'rejected', result: failure('internal_error', message) };
    }
    if (isTrustMaterialError(kind)) {
      return { status: 'unavailable', reason: `${kind}: ${message}` };
    }
    return { status: 'rejected', result: failure(kind, message) };
  }
}
