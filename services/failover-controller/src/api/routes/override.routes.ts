/**
 * Manual Override Routes
 *
 * POST /api/services/:serviceId/overrides
 *   headers: X-API-Key
 *   body:    { kind, targetRegion?, reason }
 *
 * 202 applied, 400 invalid body, 401 missing or unknown key,
 * 404 unknown service, 409 not valid in the current state.
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { ErrorCode, OverrideRejectedError } from '@regionguard/core';
import type { OverrideAuthorizer } from '../../coordination/override-authorizer';
import { getAuthenticated, requireApiKey } from '../middleware/api-key';
import type { ControllerStateProvider, MinimalLogger } from '../types';

export const OverrideRequestSchema = z.object({
  kind: z.enum(['block', 'force_failover', 'abort', 'clear_abort']),
  targetRegion: z.string().min(1).optional(),
  reason: z.string().trim().min(1, 'reason is required').max(500)
}).strict();

export type OverrideRequest = z.infer<typeof OverrideRequestSchema>;

export function createOverrideRoutes(
  state: ControllerStateProvider,
  authorizer: OverrideAuthorizer,
  logger: MinimalLogger
): Router {
  const router = Router();

  router.post(
    '/services/:serviceId/overrides',
    requireApiKey(authorizer, logger),
    (req: Request, res: Response, next: NextFunction) => {
      const { serviceId } = req.params;
      const auth = getAuthenticated(res);
      if (!auth) {
        res.status(401).json({ error: 'API key required' });
        return;
      }
      if (!state.hasService(serviceId)) {
        res.status(404).json({ error: `Unknown service ${serviceId}` });
        return;
      }

      const body = OverrideRequestSchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({
          error: 'Invalid override request',
          issues: body.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
        });
        return;
      }
      if (body.data.kind !== 'force_failover' && body.data.targetRegion !== undefined) {
        res.status(400).json({ error: 'Invalid override request', issues: ['targetRegion: only valid for force_failover'] });
        return;
      }

      state.submitOverride({
        kind: body.data.kind,
        serviceId,
        operator: auth.operator,
        credential: auth.credential,
        reason: body.data.reason,
        targetRegion: body.data.targetRegion
      })
        .then(result => {
          res.status(result.accepted ? 202 : 409).json(result);
        })
        .catch((error: unknown) => {
          if (error instanceof OverrideRejectedError && error.code === ErrorCode.OVERRIDE_UNAUTHORIZED) {
            res.status(401).json({ error: error.message });
            return;
          }
          next(error);
        });
    }
  );

  return router;
}
