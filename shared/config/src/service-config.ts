/**
 * Controller Process Settings
 *
 * Everything the controller process reads from its environment.
 * Parsed strictly: a malformed value stops startup.
 */

import { ConfigurationError, parseEnvBool, parseEnvInt, parseEnvList } from '@regionguard/core';
import { HttpUrlSchema } from './schemas';

export interface OverrideApiKey {
  /** Operator name recorded on every override made with this key */
  name: string;
  key: string;
}

export interface ControllerSettings {
  port: number;
  /** Honour X-Forwarded-For when the API sits behind a load balancer */
  trustProxy: boolean;
  fleetConfigPath: string;
  decisionTickMs: number;
  decisionQueueCapacity: number;
  shutdownTimeoutMs: number;
  /** When set, failover events are journaled in Redis instead of memory */
  redisUrl?: string;
  overrideApiKeys: OverrideApiKey[];
  notifyWebhookUrl?: string;
}

export function getControllerSettings(env: NodeJS.ProcessEnv = process.env): ControllerSettings {
  const redisUrl = env.REDIS_URL?.trim() || undefined;
  const notifyWebhookUrl = env.NOTIFY_WEBHOOK_URL?.trim() || undefined;

  if (notifyWebhookUrl && !HttpUrlSchema.safeParse(notifyWebhookUrl).success) {
    throw new ConfigurationError('Invalid NOTIFY_WEBHOOK_URL', [`"${notifyWebhookUrl}" is not an http(s) URL`]);
  }

  return {
    port: parseEnvInt('CONTROLLER_PORT', 3100, 0, 65535, env),
    trustProxy: parseEnvBool('API_TRUST_PROXY', false, env),
    fleetConfigPath: env.FLEET_CONFIG_PATH?.trim() || 'config/fleet.yaml',
    decisionTickMs: parseEnvInt('DECISION_TICK_MS', 5000, 100, undefined, env),
    decisionQueueCapacity: parseEnvInt('DECISION_QUEUE_CAPACITY', 1000, 10, undefined, env),
    shutdownTimeoutMs: parseEnvInt('SHUTDOWN_TIMEOUT_MS', 10_000, 100, undefined, env),
    redisUrl,
    overrideApiKeys: parseOverrideApiKeys(parseEnvList('OVERRIDE_API_KEYS', env)),
    notifyWebhookUrl
  };
}

/**
 * Entries are `name:key`. The key may itself contain colons.
 */
export function parseOverrideApiKeys(entries: readonly string[]): OverrideApiKey[] {
  const issues: string[] = [];
  const keys: OverrideApiKey[] = [];
  const names = new Set<string>();

  for (const [index, entry] of entries.entries()) {
    const separator = entry.indexOf(':');
    const name = separator > 0 ? entry.slice(0, separator).trim() : '';
    const key = separator > 0 ? entry.slice(separator + 1).trim() : '';

    if (!name || !key) {
      issues.push(`entry ${index + 1} must be "name:key"`);
      continue;
    }
    if (names.has(name)) {
      issues.push(`duplicate operator name "${name}"`);
      continue;
    }
    names.add(name);
    keys.push({ name, key });
  }

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid OVERRIDE_API_KEYS', issues);
  }
  return keys;
}
