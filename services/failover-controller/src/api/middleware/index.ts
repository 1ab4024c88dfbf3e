/**
 * Express middleware stack: security headers, JSON body limits, rate
 * limiting and request logging.
 */

import express from 'express';
import type { Application, NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import type { MinimalLogger } from '../types';

export { requireApiKey, getAuthenticated } from './api-key';
export type { AuthenticatedLocals } from './api-key';

export interface MiddlewareOptions {
  /** Requests per client per window */
  rateLimitMax?: number;
  rateLimitWindowMs?: number;
  /** Take the client address from X-Forwarded-For set by one load balancer hop */
  trustProxy?: boolean;
}

export function configureMiddleware(app: Application, logger: MinimalLogger, options: MiddlewareOptions = {}): void {
  if (options.trustProxy) {
    app.set('trust proxy', 1);
  }

  app.use(helmet());
  app.use(express.json({ limit: '100kb', strict: true }));

  app.use(rateLimit({
    windowMs: options.rateLimitWindowMs ?? 60_000,
    limit: options.rateLimitMax ?? 120,
    message: { error: 'Too many requests' },
    standardHeaders: true,
    legacyHeaders: false
  }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.debug('API request', {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - start
      });
    });
    next();
  });
}
