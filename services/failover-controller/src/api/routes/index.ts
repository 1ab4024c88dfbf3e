import type { Application } from 'express';
import type { OverrideAuthorizer } from '../../coordination/override-authorizer';
import type { ControllerStateProvider, MinimalLogger } from '../types';
import { createHealthRoutes } from './health.routes';
import { createOverrideRoutes } from './override.routes';
import { createServicesRoutes } from './services.routes';

export { createHealthRoutes, createOverrideRoutes, createServicesRoutes };
export { OverrideRequestSchema } from './override.routes';
export type { OverrideRequest } from './override.routes';

/**
 * Mount every router under /api.
 */
export function setupAllRoutes(
  app: Application,
  state: ControllerStateProvider,
  authorizer: OverrideAuthorizer,
  logger: MinimalLogger
): void {
  app.use('/api', createHealthRoutes(state));
  app.use('/api', createServicesRoutes(state));
  app.use('/api', createOverrideRoutes(state, authorizer, logger));
}
