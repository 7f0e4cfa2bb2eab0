import type { FastifyInstance } from 'fastify';
import type { HealthMonitor } from '../modules/health/index.js';
import type { ConsistencyPropagator } from '../modules/propagation/index.js';

export interface HealthRouteOptions {
  monitor: HealthMonitor;
  propagator: ConsistencyPropagator;
}

export async function healthRoutes(fastify: FastifyInstance, { monitor, propagator }: HealthRouteOptions): Promise<void> {
  // Served from the last snapshot; never waits on a probe
  fastify.get('/health', async (_request, reply) => {
    const snapshot = monitor.snapshot();
    return reply.status(snapshot.ok ? 200 : 503).send(snapshot);
  });

  fastify.get('/health/propagation', async () => {
    return propagator.stats();
  });
}
