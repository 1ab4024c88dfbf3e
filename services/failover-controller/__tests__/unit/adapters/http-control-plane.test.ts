import { describe, it, expect } from '@jest/globals';
import { ConfigurationError, RecordingLogger } from '@regionguard/core';
import type { ServiceDefinition } from '@regionguard/types';
import { HttpControlPlane } from '../../../src/adapters/http-control-plane';
import { createTestService } from '../../helpers/fixtures';

interface StubResponse {
  status: number;
  body?: string;
}

function withControlUrls(service: ServiceDefinition): ServiceDefinition {
  return {
    ...service,
    candidates: service.candidates.map(candidate => ({
      ...candidate,
      controlUrl: `http://control.${candidate.regionId}.test/`
    }))
  };
}

function createPlane(responses: Record<string, StubResponse>) {
  const requests: string[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const line = `${init?.method ?? 'GET'} ${String(input)}`;
    requests.push(line);
    const stub = responses[line] ?? { status: 200 };
    return new Response(stub.body ?? null, { status: stub.status });
  };
  const plane = new HttpControlPlane([withControlUrls(createTestService())], {
    fetchImpl,
    logger: new RecordingLogger()
  });
  return { plane, requests };
}

describe('HttpControlPlane', () => {
  it('refuses candidates without a control URL', () => {
    expect(() => new HttpControlPlane([createTestService()])).toThrow(ConfigurationError);
    expect(() => new HttpControlPlane([createTestService()])).toThrow('HTTP control plane needs a controlUrl per candidate');
  });

  it('promotes through the target region control API', async () => {
    const { plane, requests } = createPlane({
      'POST http://control.eu-west.test/services/checkout/promote': { status: 200, body: '{"outcome":"already_primary"}' }
    });

    await expect(plane.promote('checkout', 'eu-west')).resolves.toBe('already_primary');
    expect(requests).toEqual(['POST http://control.eu-west.test/services/checkout/promote']);
  });

  it('maps every capability onto its endpoint', async () => {
    const { plane, requests } = createPlane({});

    await plane.demote('checkout', 'eu-west');
    await plane.quiesceWrites('checkout', 'us-east');
    await plane.resumeWrites('checkout', 'eu-west');
    await plane.routeTo('checkout', 'eu-west');

    expect(requests).toEqual([
      'POST http://control.eu-west.test/services/checkout/demote',
      'POST http://control.us-east.test/services/checkout/writes/quiesce',
      'POST http://control.eu-west.test/services/checkout/writes/resume',
      'POST http://control.eu-west.test/services/checkout/traffic/activate'
    ]);
  });

  it('reads replication lag', async () => {
    const { plane } = createPlane({
      'GET http://control.ap-south.test/services/checkout/replication': { status: 200, body: '{"lagMs":1250}' }
    });

    await expect(plane.getReplicationLagMs('checkout', 'ap-south')).resolves.toBe(1250);
  });

  it('fails on a non-2xx status', async () => {
    const { plane } = createPlane({
      'POST http://control.eu-west.test/services/checkout/traffic/activate': { status: 503 }
    });

    await expect(plane.routeTo('checkout', 'eu-west')).rejects.toThrow(
      'Control plane POST http://control.eu-west.test/services/checkout/traffic/activate returned HTTP 503'
    );
  });

  it('fails on a body of the wrong shape', async () => {
    const { plane } = createPlane({
      'GET http://control.eu-west.test/services/checkout/replication': { status: 200, body: '{"lagMs":-4}' },
      'POST http://control.eu-west.test/services/checkout/promote': { status: 200, body: 'not json' }
    });

    await expect(plane.getReplicationLagMs('checkout', 'eu-west')).rejects.toThrow(
      'Control plane replication for checkout/eu-west returned an invalid body'
    );
    await expect(plane.promote('checkout', 'eu-west')).rejects.toThrow(
      'Control plane promote for checkout/eu-west returned an invalid body'
    );
  });

  it('rejects regions it has no URL for', async () => {
    const { plane } = createPlane({});
    await expect(plane.routeTo('checkout', 'mars-north')).rejects.toThrow('No control URL for checkout/mars-north');
  });
});
