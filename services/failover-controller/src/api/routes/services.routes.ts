/**
 * Service Status Routes
 *
 * Read-only view of every service: coordinator state, region records,
 * error budgets and failover history.
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { ControllerStateProvider } from '../types';

const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20)
});

export function createServicesRoutes(state: ControllerStateProvider): Router {
  const router = Router();

  router.get('/services', (_req: Request, res: Response) => {
    res.json({ services: state.listServices() });
  });

  router.get('/services/:serviceId', (req: Request, res: Response) => {
    const status = state.getService(req.params.serviceId);
    if (!status) {
      res.status(404).json({ error: `Unknown service ${req.params.serviceId}` });
      return;
    }
    res.json(status);
  });

  router.get('/services/:serviceId/failovers', (req: Request, res: Response, next: NextFunction) => {
    const { serviceId } = req.params;
    if (!state.hasService(serviceId)) {
      res.status(404).json({ error: `Unknown service ${serviceId}` });
      return;
    }
    const query = HistoryQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: 'Invalid query', issues: query.error.issues.map(issue => issue.message) });
      return;
    }

    state.listFailovers(serviceId, query.data.limit)
      .then(events => {
        res.json({ serviceId, failovers: events });
      })
      .catch(next);
  });

  return router;
}
