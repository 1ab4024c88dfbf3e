/**
 * API key authentication for override routes.
 *
 * Reads the X-API-Key header and resolves it to an operator through the
 * override authorizer. The operator and the presented key are left in
 * res.locals for the handler.
 */

import type { NextFunction, Request, Response } from 'express';
import type { OverrideAuthorizer } from '../../coordination/override-authorizer';
import type { MinimalLogger } from '../types';

export interface AuthenticatedLocals {
  operator: string;
  credential: string;
}

function extractApiKey(req: Request): string | null {
  const header = req.headers['x-api-key'];
  if (!header) {
    return null;
  }
  return Array.isArray(header) ? header[0] ?? null : header;
}

export function requireApiKey(authorizer: OverrideAuthorizer, logger: MinimalLogger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const credential = extractApiKey(req);
    if (!credential) {
      res.status(401).json({ error: 'API key required' });
      return;
    }

    const operator = authorizer.authorize(credential);
    if (!operator) {
      logger.warn('Rejected override request with unknown API key', { path: req.path, ip: req.ip });
      res.status(401).json({ error: 'Invalid API key' });
      return;
    }

    const locals: AuthenticatedLocals = { operator, credential };
    Object.assign(res.locals, locals);
    next();
  };
}

/**
 * Read what requireApiKey stored.
 */
export function getAuthenticated(res: Response): AuthenticatedLocals | null {
  const { operator, credential }: Record<string, unknown> = res.locals;
  if (typeof operator !== 'string' || typeof credential !== 'string') {
    return null;
  }
  return { operator, credential };
}
