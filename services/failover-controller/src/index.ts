/**
 * Failover Controller Entry Point & Public API
 *
 * Environment Variables:
 * - CONTROLLER_PORT: HTTP API port (default: 3100)
 * - API_TRUST_PROXY: read client addresses from X-Forwarded-For (default: false)
 * - FLEET_CONFIG_PATH: fleet file, YAML or JSON (default: config/fleet.yaml)
 * - DECISION_TICK_MS: coordinator tick interval (default: 5000)
 * - DECISION_QUEUE_CAPACITY: per-service decision queue bound (default: 1000)
 * - SHUTDOWN_TIMEOUT_MS: bound on each shutdown stage (default: 10000)
 * - REDIS_URL: failover journal in Redis; in memory when unset
 * - OVERRIDE_API_KEYS: comma-separated name:key pairs
 * - NOTIFY_WEBHOOK_URL: webhook for failover notifications
 */

export { FailoverControllerService } from './controller';
export type { FailoverControllerDeps } from './controller';
export * from './api';
export { Notifier, LogChannel, WebhookChannel } from './alerts/notifier';
export type { ControllerEventSink, NotificationChannel } from './alerts/notifier';
export { ServiceDecisionLoop } from './coordination/decision-loop';
export { FailoverCoordinator } from './coordination/failover-coordinator';
export type { TargetVerifier } from './coordination/failover-coordinator';
export { ApiKeyOverrideAuthorizer } from './coordination/override-authorizer';
export type { OverrideAuthorizer } from './coordination/override-authorizer';
export { FailureDetector } from './detection/failure-detector';
export { FailoverExecutor } from './execution/failover-executor';
export type { ExecutionResult, RollbackResult } from './execution/failover-executor';
export { createDefaultSteps } from './execution/failover-steps';
export type { FailoverStep, StepContext } from './execution/failover-steps';
export type * from './execution/capabilities';
export { InMemoryFailoverJournal } from './journal/failover-journal';
export type { FailoverEventJournal } from './journal/failover-journal';
export { RedisFailoverJournal } from './journal/redis-journal';
export { HealthProbe } from './probe/health-probe';
export { HttpHealthEndpoint } from './probe/health-endpoint';
export type { HealthEndpoint, HealthCheckResult } from './probe/health-endpoint';
export { ProbeScheduler } from './probe/probe-scheduler';
export { SloTracker } from './slo/slo-tracker';
export { RegionStateStore } from './state/region-state-store';
export { HttpControlPlane } from './adapters/http-control-plane';

import type { Server } from 'http';
import { getControllerSettings, loadFleetConfig } from '@regionguard/config';
import { createLogger, createRedisClient, getErrorMessage, gracefulShutdown } from '@regionguard/core';
import { HttpControlPlane } from './adapters/http-control-plane';
import { LogChannel, Notifier, WebhookChannel } from './alerts/notifier';
import { createApiApp } from './api';
import { ApiKeyOverrideAuthorizer } from './coordination/override-authorizer';
import { FailoverControllerService } from './controller';
import { InMemoryFailoverJournal } from './journal/failover-journal';
import { RedisFailoverJournal } from './journal/redis-journal';

const logger = createLogger('failover-controller');

export async function main(): Promise<void> {
  const settings = getControllerSettings();
  const fleet = loadFleetConfig(settings.fleetConfigPath);

  logger.info('Starting failover controller', {
    port: settings.port,
    fleetConfigPath: settings.fleetConfigPath,
    services: fleet.services.map(service => service.id),
    journal: settings.redisUrl ? 'redis' : 'memory'
  });
  if (settings.overrideApiKeys.length === 0) {
    logger.warn('OVERRIDE_API_KEYS is empty; every manual override will be rejected');
  }

  const redis = settings.redisUrl ? createRedisClient(settings.redisUrl) : null;
  if (redis) {
    await redis.connect();
  }

  const notifier = new Notifier({
    logger,
    channels: [
      new LogChannel(createLogger('notifier')),
      new WebhookChannel(settings.notifyWebhookUrl)
    ]
  });

  const controller = new FailoverControllerService({
    fleet,
    capabilities: new HttpControlPlane(fleet.services).capabilities(),
    authorizer: new ApiKeyOverrideAuthorizer(settings.overrideApiKeys),
    journal: redis ? new RedisFailoverJournal(redis) : new InMemoryFailoverJournal(),
    notifier,
    decisionTickMs: settings.decisionTickMs,
    decisionQueueCapacity: settings.decisionQueueCapacity,
    shutdownTimeoutMs: settings.shutdownTimeoutMs,
    logger
  });

  await controller.start();

  const app = createApiApp({ ...controller.apiOptions(), middleware: { trustProxy: settings.trustProxy } });
  const server: Server = await new Promise(resolve => {
    const listening = app.listen(settings.port, () => resolve(listening));
  });
  logger.info(`Failover controller API listening on port ${settings.port}`);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);

    await gracefulShutdown([
      {
        name: 'http-server',
        cleanup: () => new Promise<void>((resolve, reject) => {
          server.close(error => (error ? reject(error) : resolve()));
        })
      },
      { name: 'controller', cleanup: () => controller.stop() },
      {
        name: 'redis',
        cleanup: async () => {
          if (redis) {
            await redis.quit();
          }
        }
      }
    ], settings.shutdownTimeoutMs, logger);
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', { error: getErrorMessage(error) });
        process.exit(1);
      });
    });
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Failover controller failed to start', { error: getErrorMessage(error) });
    process.exit(1);
  });
}
