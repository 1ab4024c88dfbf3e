/**
 * API Module
 *
 * Re-exports the express app factory, routes, middleware and types.
 */

export * from './types';
export { createApiApp } from './server';
export type { ApiAppOptions } from './server';
export { configureMiddleware, requireApiKey, getAuthenticated } from './middleware';
export type { MiddlewareOptions, AuthenticatedLocals } from './middleware';
export {
  setupAllRoutes,
  createHealthRoutes,
  createServicesRoutes,
  createOverrideRoutes,
  OverrideRequestSchema
} from './routes';
export type { OverrideRequest } from './routes';
