/**
 * Health endpoint capability and its HTTP implementation.
 */

export interface HealthCheckResult {
  healthy: boolean;
  /** Latency reported by the endpoint itself, if any */
  latencyMs?: number;
  detail?: string;
}

/**
 * A region's health check for one service. Implementations must honour
 * the abort signal; the probe aborts it when the timeout expires.
 */
export interface HealthEndpoint {
  check(signal: AbortSignal): Promise<HealthCheckResult>;
}

export interface HttpHealthEndpointDeps {
  fetchImpl?: typeof fetch;
}

/**
 * GET against a health URL. Any 2xx is healthy.
 */
export class HttpHealthEndpoint implements HealthEndpoint {
  private readonly fetchImpl: typeof fetch;

  constructor(readonly url: string, deps: HttpHealthEndpointDeps = {}) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
  }

  async check(signal: AbortSignal): Promise<HealthCheckResult> {
    const response = await this.fetchImpl(this.url, {
      method: 'GET',
      headers: { Accept: 'application/json' },
      signal
    });

    // Releases the connection; only the status is used
    await response.body?.cancel();

    if (response.ok) {
      return { healthy: true };
    }
    return { healthy: false, detail: `HTTP ${response.status}` };
  }
}
