/**
 * Cached backend liveness. Health checks from load balancers arrive
 * often; the backend is asked at most once per cache window.
 */
import type { BackendStreamClient } from './types.js';

export interface BackendHealth {
  healthy: boolean;
  checkedAt: Date;
}

export interface HealthProbe {
  check(): Promise<BackendHealth>;
}

export interface HealthProbeOptions {
  client: Pick<BackendStreamClient, 'checkHealth'>;
  cacheMs: number;
  /** Per-probe timeout. */
  timeoutMs?: number;
  now?: () => number;
}

const DEFAULT_PROBE_TIMEOUT_MS = 3_000;

export function createHealthProbe(options: HealthProbeOptions): HealthProbe {
  const { client, cacheMs } = options;
  const now = options.now ?? Date.now;
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  let cached: BackendHealth | null = null;
  let inFlight: Promise<BackendHealth> | null = null;

  async function probe(): Promise<BackendHealth> {
    const healthy = await client.checkHealth(AbortSignal.timeout(timeoutMs));
    cached = { healthy, checkedAt: new Date(now()) };
    return cached;
  }

  return {
    check(): Promise<BackendHealth> {
      if (cached && now() - cached.checkedAt.getTime() < cacheMs) {
        return Promise.resolve(cached);
      }
      if (!inFlight) {
        inFlight = probe().finally(() => {
          inFlight = null;
        });
      }
      return inFlight;
    },
  };
}
