/**
 * Express application for the Validation API
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { failure } from '@kube-federated-auth/token-validator';
import { createValidationRouter, type ServiceDeps } from './routes.js';

function bodyParserErrorType(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
    return err.type;
  }
  return undefined;
}

export function createApp(deps: ServiceDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '64kb' }));

  app.use(createValidationRouter(deps));

  app.use((req, res) => {
    res.status(404).json({
      error: 'not_found',
      message: `Route ${req.method} ${req.path} not found`,
    });
  });

  // Express recognises error handlers by arity, so `next` must stay
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const type = bodyParserErrorType(err);
    if (type === 'entity.parse.failed') {
      res.status(400).json(failure('invalid_request', 'Request body is not valid JSON'));
      return;
    }
    if (type === 'entity.too.large') {
      res.status(400).json(failure('invalid_request', 'Request body too large'));
      return;
    }

    console.error(`[Server] Unhandled error on ${req.method} ${req.path}:`, err);
    const message = err instanceof Error ? err.message : String(err);
    res.status(500).json(failure('internal_error', `Unexpected error during validation: ${message}`));
  });

  return app;
}
