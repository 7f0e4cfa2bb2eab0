import type { FastifyInstance } from 'fastify';
import { searchFiltersSchema, simpleSearchSchema, type QueryRouter } from '../modules/search/index.js';
import { parseInput } from '../utils/validation.js';

export interface SearchRouteOptions {
  router: QueryRouter;
}

export async function searchRoutes(fastify: FastifyInstance, { router }: SearchRouteOptions): Promise<void> {
  fastify.get('/search/results', async (request) => {
    const search = parseInput(simpleSearchSchema, request.query, 'query string');
    return router.results(search);
  });

  fastify.post('/search/advanced-results', async (request) => {
    const filters = parseInput(searchFiltersSchema, request.body ?? {});
    return router.advancedResults(filters);
  });

  fastify.post('/search/latest-tickets', async (request) => {
    const filters = parseInput(searchFiltersSchema, request.body ?? {});
    return router.latest(filters);
  });

  fastify.post('/search/options', async (request) => {
    const filters = parseInput(searchFiltersSchema, request.body ?? {});
    return router.options(filters);
  });
}
