/**
 * Liveness for load balancers: the bridge itself plus the cached backend probe.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';

export interface HealthBody {
  status: 'ok' | 'degraded';
  timestamp: string;
  backend: { healthy: boolean; checkedAt: string };
  sessions: { active: number; suspended: number };
}

/** Register the GET /health route. */
export function healthRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  fastify.get('/health', async (_request, reply) => {
    const backend = await deps.healthProbe.check();
    const body: HealthBody = {
      status: backend.healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      backend: { healthy: backend.healthy, checkedAt: backend.checkedAt.toISOString() },
      sessions: deps.sessionStore.stats(),
    };
    reply.status(backend.healthy ? 200 : 503);
    return body;
  });
}
