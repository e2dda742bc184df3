/**
 * Validation API routes
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import {
  failure,
  httpStatusFor,
  type ClusterRegistry,
  type JWKSCacheManager,
  type TokenValidator,
} from '@kube-federated-auth/token-validator';

export interface ServiceDeps {
  registry: Pick<ClusterRegistry, 'list' | 'count'>;
  validator: Pick<TokenValidator, 'validate'>;
  jwksCache: Pick<JWKSCacheManager, 'clear'>;
}

export const validateRequestSchema = z.object({
  cluster: z.string().min(1),
  token: z.string().min(1),
});

/**
 * Older database plugins send `cluster_name` instead of `cluster`
 */
export const legacyValidateRequestSchema = z
  .object({
    cluster: z.string().min(1).optional(),
    cluster_name: z.string().min(1).optional(),
    token: z.string().min(1),
  })
  .transform(({ cluster, cluster_name, token }) => ({ cluster: cluster ?? cluster_name, token }))
  .pipe(validateRequestSchema);

export type ValidateRequest = z.infer<typeof validateRequestSchema>;

type ValidateRequestSchema = z.ZodType<ValidateRequest, z.ZodTypeDef, unknown>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

export function createValidationRouter(deps: ServiceDeps): Router {
  const router = Router();

  const validate = (schema: ValidateRequestSchema) => async (req: Request, res: Response, next: NextFunction) => {
    const parsed = schema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(failure('invalid_request', describeIssues(parsed.error)));
      return;
    }

    // Stop waiting on outbound fetches once the caller has gone away
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const result = await deps.validator.validate(parsed.data.cluster, parsed.data.token, controller.signal);
      res.status(result.authenticated ? 200 : httpStatusFor(result.error)).json(result);
    } catch (error) {
      next(error);
    }
  };

  /**
   * Validate a ServiceAccount token issued by a named cluster
   */
  router.post('/validate', validate(validateRequestSchema));
  router.post('/api/v1/validate', validate(legacyValidateRequestSchema));

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', cluster_count: deps.registry.count() });
  });

  /**
   * Configured cluster names; trust material is never returned
   */
  router.get('/clusters', (_req, res) => {
    const clusters = deps.registry.list();
    res.json({ clusters, count: clusters.length });
  });

  router.post('/cache/jwks/clear', (_req, res) => {
    const cleared = deps.jwksCache.clear();
    res.json({ success: true, cleared });
  });

  return router;
}
