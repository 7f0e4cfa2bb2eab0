import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { SEARCHABLE_ENTITY_TYPES } from '../domain/entities.js';
import type { ConsistencyPropagator } from '../modules/propagation/index.js';
import { parseInput } from '../utils/validation.js';

export interface AdminRouteOptions {
  propagator: ConsistencyPropagator;
}

const reindexParamsSchema = z.object({ entityType: z.enum(SEARCHABLE_ENTITY_TYPES) });

export async function adminRoutes(fastify: FastifyInstance, { propagator }: AdminRouteOptions): Promise<void> {
  // Re-project every record of a type, e.g. after the index was rebuilt
  fastify.post('/admin/reindex/:entityType', async (request, reply) => {
    const { entityType } = parseInput(reindexParamsSchema, request.params, 'path');
    const queued = await propagator.reindex(entityType);
    return reply.status(202).send({ entityType, queued });
  });
}
