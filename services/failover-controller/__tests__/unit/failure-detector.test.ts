/**
 * Failure Detector Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import type { DetectorState, DetectorTransition, ProbeOutcome, ServiceDefinition } from '@regionguard/types';
import { FailureDetector, toRegionState } from '../../src/detection/failure-detector';
import { SloTracker } from '../../src/slo/slo-tracker';
import { RegionStateStore } from '../../src/state/region-state-store';
import { CapturingSink, ManualClock, createSample, createTestService } from '../helpers/fixtures';
import type { TestServiceOptions } from '../helpers/fixtures';

function createHarness(options: TestServiceOptions = {}) {
  const service: ServiceDefinition = createTestService(options);
  const sink = new CapturingSink();
  const clock = new ManualClock();
  const store = new RegionStateStore({ sink, clock });
  const slo = new SloTracker();
  const detector = new FailureDetector({ store, slo, sink, clock });
  store.register(service);
  slo.register(service);
  detector.register(service);

  const feed = (timestamp: number, outcome: ProbeOutcome = 'success', regionId = 'us-east'): DetectorTransition | null => {
    const sample = createSample(regionId, timestamp, outcome);
    slo.record(sample);
    return detector.evaluate(sample);
  };

  return { service, sink, store, slo, detector, feed };
}

describe('FailureDetector', () => {
  it('moves to suspected_degraded on a single failure', () => {
    const { feed, detector } = createHarness();
    feed(10_000);

    const transition = feed(20_000, 'failure');

    expect(transition).toEqual({
      serviceId: 'checkout',
      regionId: 'us-east',
      from: 'healthy',
      to: 'suspected_degraded',
      reason: 'probe failure',
      timestamp: 20_000
    });
    expect(detector.getState('checkout', 'us-east')).toBe('suspected_degraded');
  });

  it('never moves past suspected_degraded on a single failure', () => {
    const { feed, detector } = createHarness();
    const seen: DetectorState[] = [];

    feed(10_000, 'failure');
    for (let t = 20_000; t <= 600_000; t += 10_000) {
      feed(t);
      const state = detector.getState('checkout', 'us-east');
      if (state) seen.push(state);
    }

    expect(seen).not.toContain('degraded');
    expect(seen).not.toContain('unreachable');
  });

  it('degrades after N consecutive failures within the window', () => {
    const { feed, store } = createHarness();

    expect(feed(10_000, 'failure')?.to).toBe('suspected_degraded');
    expect(feed(20_000, 'failure')).toBeNull();
    const transition = feed(30_000, 'failure');

    expect(transition?.to).toBe('degraded');
    expect(transition?.reason).toBe('3 consecutive failures within 20000ms');
    expect(store.require('checkout', 'us-east').state).toBe('degraded');
    expect(store.require('checkout', 'us-east').consecutiveFailures).toBe(3);
  });

  it('does not degrade when the failures spread beyond the window', () => {
    const { feed, detector } = createHarness();

    feed(0, 'failure');
    feed(40_000, 'failure');
    feed(80_000, 'failure');
    feed(120_000, 'failure');

    expect(detector.getState('checkout', 'us-east')).toBe('suspected_degraded');
  });

  it('returns to healthy from suspected after M successes within budget', () => {
    const { feed, detector } = createHarness({ target: 0.5 });
    for (let t = 10_000; t <= 50_000; t += 10_000) feed(t);

    feed(60_000, 'failure');
    const results = [70_000, 80_000, 90_000, 100_000].map(t => feed(t));
    expect(results).toEqual([null, null, null, null]);

    expect(feed(110_000)).toMatchObject({ from: 'suspected_degraded', to: 'healthy', reason: '5 consecutive successes' });
    expect(detector.getState('checkout', 'us-east')).toBe('healthy');
  });

  it('marks a region unreachable after failing for half the RTO', () => {
    const { feed, store } = createHarness({ rtoMs: 60_000 });

    feed(10_000, 'failure');
    feed(20_000, 'failure');
    feed(30_000, 'failure');
    const transition = feed(40_000, 'failure');

    expect(transition).toMatchObject({
      from: 'degraded',
      to: 'unreachable',
      reason: 'failing continuously for 30000ms (half the RTO)'
    });
    expect(store.require('checkout', 'us-east').state).toBe('unreachable');
  });

  it('marks a region unreachable after a short window of hard burn', () => {
    const { feed, detector } = createHarness({ rtoMs: 36_000_000 });
    let last: DetectorTransition | null = null;

    for (let t = 10_000; t <= 310_000; t += 10_000) {
      const transition = feed(t, 'failure');
      if (transition) last = transition;
    }

    expect(last).toMatchObject({
      from: 'degraded',
      to: 'unreachable',
      reason: 'short-window burn rate above 10 for 300000ms',
      timestamp: 310_000
    });
    expect(detector.getState('checkout', 'us-east')).toBe('unreachable');
  });

  it('recovers through recovering with M successes at each stage', () => {
    const { feed, detector, store } = createHarness({ target: 0.5, rtoMs: 60_000 });
    for (const t of [10_000, 20_000, 30_000, 40_000]) feed(t, 'failure');
    expect(detector.getState('checkout', 'us-east')).toBe('unreachable');

    for (const t of [50_000, 60_000, 70_000, 80_000]) {
      expect(feed(t)).toBeNull();
    }
    expect(feed(90_000)?.to).toBe('recovering');
    expect(store.require('checkout', 'us-east').state).toBe('degraded');

    for (const t of [100_000, 110_000, 120_000, 130_000]) {
      expect(feed(t)).toBeNull();
    }
    expect(feed(140_000)).toMatchObject({ from: 'recovering', to: 'healthy', reason: '5 further consecutive successes' });
    expect(store.require('checkout', 'us-east').state).toBe('healthy');
  });

  it('falls back to degraded on a failure while recovering', () => {
    const { feed } = createHarness({ target: 0.5, rtoMs: 60_000 });
    for (const t of [10_000, 20_000, 30_000, 40_000]) feed(t, 'failure');
    for (const t of [50_000, 60_000, 70_000, 80_000, 90_000]) feed(t);

    expect(feed(100_000, 'timeout')).toMatchObject({
      from: 'recovering',
      to: 'degraded',
      reason: 'probe timeout while recovering'
    });
  });

  it('makes a failed region earn its way back through recovery', () => {
    const { feed, store, detector } = createHarness();
    store.transition('checkout', 'eu-west', 'healthy', 'failed');

    expect(feed(10_000, 'success', 'eu-west')).toBeNull();
    expect(detector.getState('checkout', 'eu-west')).toBe('degraded');
    expect(store.require('checkout', 'eu-west').state).toBe('failed');

    for (const t of [20_000, 30_000, 40_000]) feed(t, 'success', 'eu-west');
    expect(feed(50_000, 'success', 'eu-west')?.to).toBe('recovering');
    expect(store.require('checkout', 'eu-west').state).toBe('degraded');
  });

  it('leaves a promoting region to the coordinator', () => {
    const { feed, store } = createHarness();
    store.transition('checkout', 'eu-west', 'healthy', 'promoting');

    expect(feed(10_000, 'failure', 'eu-west')?.to).toBe('suspected_degraded');
    expect(store.require('checkout', 'eu-west').state).toBe('promoting');
  });

  it('emits each transition to the sink', () => {
    const { feed, sink } = createHarness();
    feed(10_000, 'failure');

    const events = sink.ofType('detector_transition');
    expect(events).toHaveLength(1);
    expect(events[0].transition.to).toBe('suspected_degraded');
  });

  it('ignores samples for unknown services', () => {
    const { detector } = createHarness();
    expect(detector.evaluate(createSample('us-east', 10_000, 'failure', 50, 'search'))).toBeNull();
  });
});

describe('toRegionState', () => {
  it('maps detector states onto region states', () => {
    const states: DetectorState[] = ['healthy', 'suspected_degraded', 'degraded', 'unreachable', 'recovering'];
    expect(states.map(toRegionState)).toEqual(['healthy', 'degraded', 'degraded', 'unreachable', 'degraded']);
  });
});
