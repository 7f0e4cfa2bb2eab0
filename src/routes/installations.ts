import type { FastifyInstance } from 'fastify';
import {
  scheduleInputSchema,
  undoneJobsQuerySchema,
  versionSchema,
  type LifecycleService,
} from '../modules/lifecycle/index.js';
import type { TechnicianDirectory } from '../modules/technicians/index.js';
import { parseInput } from '../utils/validation.js';

export interface InstallationRouteOptions {
  lifecycle: LifecycleService;
  technicians: TechnicianDirectory;
}

type IdParams = { Params: { id: string } };

export async function installationRoutes(
  fastify: FastifyInstance,
  { lifecycle, technicians }: InstallationRouteOptions
): Promise<void> {
  fastify.get('/installations/undone-jobs', async (request) => {
    const query = parseInput(undoneJobsQuerySchema, request.query, 'query string');
    return lifecycle.listUndoneInstallations(query);
  });

  fastify.get<IdParams>('/installations/:id', async (request) => {
    return lifecycle.getInstallation(request.params.id);
  });

  fastify.post<IdParams>('/installations/:id/schedule', async (request) => {
    const input = parseInput(scheduleInputSchema, request.body);
    return lifecycle.scheduleInstallation(request.params.id, input);
  });

  fastify.post<IdParams>('/installations/:id/start', async (request) => {
    const { version } = parseInput(versionSchema, request.body ?? {});
    return lifecycle.startInstallation(request.params.id, { expectedVersion: version });
  });

  fastify.post<IdParams>('/installations/:id/finish', async (request) => {
    const { version } = parseInput(versionSchema, request.body ?? {});
    return lifecycle.finishInstallation(request.params.id, { expectedVersion: version });
  });

  fastify.get('/technicians', async () => {
    const list = await technicians.list();
    return { technicians: list };
  });
}
