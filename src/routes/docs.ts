import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { DOC_INPUT_SCHEMAS, DOC_LEVEL_NAMES, docPatchSchema, type DocsHierarchy } from '../modules/docs/index.js';
import { parseInput } from '../utils/validation.js';

export interface DocsRouteOptions {
  docs: DocsHierarchy;
}

const levelParamsSchema = z.object({
  level: z.enum(DOC_LEVEL_NAMES),
  id: z.string().min(1),
});

export async function docsRoutes(fastify: FastifyInstance, { docs }: DocsRouteOptions): Promise<void> {
  // Top level
  fastify.get('/docs/categories', async () => {
    const items = await docs.list('categories', null);
    return { items };
  });

  fastify.post('/docs/categories', async (request, reply) => {
    const input = parseInput(DOC_INPUT_SCHEMAS.categories, request.body);
    return reply.status(201).send(await docs.create('categories', input));
  });

  // Nested levels, listed by parent id
  for (const level of ['subcategories', 'subsubcategories', 'steps'] as const) {
    fastify.get<{ Params: { parentId: string } }>(`/docs/${level}/:parentId`, async (request) => {
      const items = await docs.list(level, request.params.parentId);
      return { items };
    });

    fastify.post(`/docs/${level}`, async (request, reply) => {
      const input = parseInput(DOC_INPUT_SCHEMAS[level], request.body);
      return reply.status(201).send(await docs.create(level, input));
    });
  }

  fastify.patch('/docs/:level/:id', async (request) => {
    const { level, id } = parseInput(levelParamsSchema, request.params, 'path');
    const { version, ...changes } = parseInput(docPatchSchema, request.body);
    return docs.update(level, id, changes, version);
  });

  fastify.delete('/docs/:level/:id', async (request) => {
    const { level, id } = parseInput(levelParamsSchema, request.params, 'path');
    const removed = await docs.remove(level, id);
    return { removed };
  });
}
