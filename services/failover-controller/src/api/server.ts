/**
 * HTTP API application.
 */

import express from 'express';
import type { Application, NextFunction, Request, Response } from 'express';
import { ErrorCode, formatErrorForResponse, toError } from '@regionguard/core';
import type { OverrideAuthorizer } from '../coordination/override-authorizer';
import { configureMiddleware } from './middleware';
import type { MiddlewareOptions } from './middleware';
import { setupAllRoutes } from './routes';
import type { ControllerStateProvider, MinimalLogger } from './types';

export interface ApiAppOptions {
  state: ControllerStateProvider;
  authorizer: OverrideAuthorizer;
  logger: MinimalLogger;
  middleware?: MiddlewareOptions;
}

export function createApiApp(options: ApiAppOptions): Application {
  const { state, authorizer, logger } = options;
  const app = express();

  configureMiddleware(app, logger, options.middleware);
  setupAllRoutes(app, state, authorizer, logger);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Express recognises error handlers by their four parameters
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = toError(err);
    const isBadJson = err instanceof SyntaxError && 'body' in err;
    if (isBadJson) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    logger.error('API request failed', { method: req.method, url: req.originalUrl, error: error.message });
    const body = formatErrorForResponse(error);
    res.status(body.code === ErrorCode.NOT_FOUND ? 404 : 500).json({ error: body.message, code: body.code });
  });

  return app;
}
