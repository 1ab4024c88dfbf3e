/**
 * Controller Settings Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import { ConfigurationError } from '@regionguard/core';
import { getControllerSettings, parseOverrideApiKeys } from '@regionguard/config';

describe('getControllerSettings()', () => {
  it('applies defaults for an empty environment', () => {
    expect(getControllerSettings({})).toEqual({
      port: 3100,
      trustProxy: false,
      fleetConfigPath: 'config/fleet.yaml',
      decisionTickMs: 5000,
      decisionQueueCapacity: 1000,
      shutdownTimeoutMs: 10_000,
      redisUrl: undefined,
      overrideApiKeys: [],
      notifyWebhookUrl: undefined
    });
  });

  it('reads every variable', () => {
    const settings = getControllerSettings({
      CONTROLLER_PORT: '8088',
      API_TRUST_PROXY: 'true',
      FLEET_CONFIG_PATH: '/etc/fleet.json',
      DECISION_TICK_MS: '1000',
      DECISION_QUEUE_CAPACITY: '50',
      REDIS_URL: 'redis://localhost:6379',
      OVERRIDE_API_KEYS: 'oncall:test-key-1,sre:test-key-2',
      NOTIFY_WEBHOOK_URL: 'https://hooks.example.test/failover'
    });

    expect(settings.port).toBe(8088);
    expect(settings.trustProxy).toBe(true);
    expect(settings.fleetConfigPath).toBe('/etc/fleet.json');
    expect(settings.decisionTickMs).toBe(1000);
    expect(settings.decisionQueueCapacity).toBe(50);
    expect(settings.redisUrl).toBe('redis://localhost:6379');
    expect(settings.overrideApiKeys).toEqual([
      { name: 'oncall', key: 'test-key-1' },
      { name: 'sre', key: 'test-key-2' }
    ]);
    expect(settings.notifyWebhookUrl).toBe('https://hooks.example.test/failover');
  });

  it('throws on a malformed number', () => {
    expect(() => getControllerSettings({ DECISION_TICK_MS: 'soon' }))
      .toThrow('Invalid DECISION_TICK_MS: "soon" is not a valid integer');
  });

  it('throws on a non-http webhook URL', () => {
    expect(() => getControllerSettings({ NOTIFY_WEBHOOK_URL: 'ftp://hooks.test' })).toThrow(ConfigurationError);
  });
});

describe('parseOverrideApiKeys()', () => {
  it('keeps colons inside the key', () => {
    expect(parseOverrideApiKeys(['oncall:test:secret'])).toEqual([{ name: 'oncall', key: 'test:secret' }]);
  });

  it('collects every malformed entry', () => {
    try {
      parseOverrideApiKeys(['nokey', ':orphan', 'a:1', 'a:2']);
      throw new Error('expected failure');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues).toEqual([
          'entry 1 must be "name:key"',
          'entry 2 must be "name:key"',
          'duplicate operator name "a"'
        ]);
      }
    }
  });
});
