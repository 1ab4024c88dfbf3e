/**
 * Probe Scheduler Unit Tests
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { NullLogger } from '@regionguard/core';
import type { ProbeSample } from '@regionguard/types';
import { HealthProbe } from '../../src/probe/health-probe';
import type { HealthCheckResult, HealthEndpoint } from '../../src/probe/health-endpoint';
import { ProbeScheduler } from '../../src/probe/probe-scheduler';
import { ManualClock, ScriptedEndpoint } from '../helpers/fixtures';

/**
 * Endpoint whose checks stay open until released.
 */
class GatedEndpoint implements HealthEndpoint {
  calls = 0;
  private releases: Array<(result: HealthCheckResult) => void> = [];

  check(): Promise<HealthCheckResult> {
    this.calls++;
    return new Promise(resolve => {
      this.releases.push(resolve);
    });
  }

  releaseAll(): void {
    for (const release of this.releases) {
      release({ healthy: true, latencyMs: 5 });
    }
    this.releases = [];
  }
}

describe('ProbeScheduler', () => {
  let scheduler: ProbeScheduler | undefined;

  afterEach(async () => {
    await scheduler?.stop();
    scheduler = undefined;
  });

  function createScheduler(endpoints: Record<string, HealthEndpoint>, samples: ProbeSample[]): ProbeScheduler {
    const probe = new HealthProbe({ logger: new NullLogger(), clock: new ManualClock() });
    return new ProbeScheduler(
      Object.entries(endpoints).map(([regionId, endpoint]) => ({
        serviceId: 'checkout',
        regionId,
        endpoint,
        intervalMs: 60_000,
        timeoutMs: 1_000
      })),
      { probe, logger: new NullLogger(), onSample: sample => samples.push(sample) }
    );
  }

  it('delivers one sample per probe', async () => {
    const samples: ProbeSample[] = [];
    scheduler = createScheduler({ 'us-east': new ScriptedEndpoint(), 'eu-west': new ScriptedEndpoint() }, samples);

    expect(scheduler.probeNow('checkout', 'us-east')).toBe(true);
    expect(scheduler.probeNow('checkout', 'eu-west')).toBe(true);
    await scheduler.whenIdle();

    expect(samples.map(sample => sample.regionId).sort()).toEqual(['eu-west', 'us-east']);
    expect(samples.every(sample => sample.outcome === 'success')).toBe(true);
  });

  it('suppresses a probe while the previous one for the same pair is in flight', async () => {
    const samples: ProbeSample[] = [];
    const gated = new GatedEndpoint();
    scheduler = createScheduler({ 'us-east': gated }, samples);

    expect(scheduler.probeNow('checkout', 'us-east')).toBe(true);
    expect(scheduler.probeNow('checkout', 'us-east')).toBe(false);
    expect(scheduler.probeNow('checkout', 'us-east')).toBe(false);
    expect(scheduler.getSuppressedCount('checkout', 'us-east')).toBe(2);
    expect(gated.calls).toBe(1);

    gated.releaseAll();
    await scheduler.whenIdle();
    expect(samples).toHaveLength(1);

    expect(scheduler.probeNow('checkout', 'us-east')).toBe(true);
    gated.releaseAll();
    await scheduler.whenIdle();
    expect(samples).toHaveLength(2);
  });

  it('does not block other pairs behind a slow one', async () => {
    const samples: ProbeSample[] = [];
    const gated = new GatedEndpoint();
    scheduler = createScheduler({ 'us-east': gated, 'eu-west': new ScriptedEndpoint() }, samples);

    scheduler.probeNow('checkout', 'us-east');
    scheduler.probeNow('checkout', 'eu-west');
    await new Promise<void>(resolve => setImmediate(resolve));

    expect(samples.map(sample => sample.regionId)).toEqual(['eu-west']);
    gated.releaseAll();
    await scheduler.whenIdle();
  });

  it('returns false for an unknown pair', () => {
    scheduler = createScheduler({ 'us-east': new ScriptedEndpoint() }, []);
    expect(scheduler.probeNow('checkout', 'mars-north')).toBe(false);
  });

  it('stop waits for probes in flight', async () => {
    const samples: ProbeSample[] = [];
    const gated = new GatedEndpoint();
    scheduler = createScheduler({ 'us-east': gated }, samples);
    scheduler.start();
    scheduler.probeNow('checkout', 'us-east');

    const stopped = scheduler.stop();
    gated.releaseAll();
    await stopped;

    expect(samples).toHaveLength(1);
  });
});
