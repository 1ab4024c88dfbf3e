/**
 * Health Check Routes
 *
 * Liveness and readiness for the controller process itself. No
 * authentication: orchestrators must reach them.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { ControllerStateProvider } from '../types';

export function createHealthRoutes(state: ControllerStateProvider): Router {
  const router = Router();

  /**
   * GET /api/health/live
   * 200 while the process is up.
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.json({ status: 'alive', timestamp: Date.now() });
  });

  /**
   * GET /api/health/ready
   * 200 once probing and decision loops are running.
   */
  router.get('/health/ready', (_req: Request, res: Response) => {
    const isRunning = state.isRunning();
    res.status(isRunning ? 200 : 503).json({
      status: isRunning ? 'ready' : 'not_ready',
      services: state.listServices().length,
      timestamp: Date.now()
    });
  });

  return router;
}
