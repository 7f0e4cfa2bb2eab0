import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { AppError, BackendUnavailableError, ValidationError } from './errors.js';
import type { Services } from './services.js';
import type { HealthSnapshot } from './modules/health/index.js';
import { healthRoutes } from './routes/health.js';
import { salesRoutes } from './routes/sales.js';
import { installationRoutes } from './routes/installations.js';
import { searchRoutes } from './routes/search.js';
import { notificationRoutes } from './routes/notifications.js';
import { docsRoutes } from './routes/docs.js';
import { adminRoutes } from './routes/admin.js';

export interface AppOptions {
  logger?: FastifyServerOptions['logger'];
  corsOrigins?: string[];
}

interface ErrorBody {
  error: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, string[] | undefined>;
  health?: HealthSnapshot;
}

export async function buildApp(services: Services, options: AppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? false,
  });

  // Register plugins
  await fastify.register(cors, {
    origin: options.corsOrigins?.length ? options.corsOrigins : true,
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof AppError) {
      const body: ErrorBody = { error: error.kind, message: error.message };
      if (error.retryable) body.retryable = true;
      if (error instanceof ValidationError && error.details) body.details = error.details;
      if (error instanceof BackendUnavailableError) body.health = services.monitor.snapshot();
      return reply.status(error.statusCode).send(body);
    }

    // Malformed JSON and similar client errors raised by Fastify itself
    if (
      error instanceof Error &&
      'statusCode' in error &&
      typeof error.statusCode === 'number' &&
      error.statusCode >= 400 &&
      error.statusCode < 500
    ) {
      return reply.status(error.statusCode).send({ error: 'BadRequest', message: error.message });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal', message: 'Internal server error' });
  });

  // Register routes
  await fastify.register(healthRoutes, { monitor: services.monitor, propagator: services.propagator });
  await fastify.register(salesRoutes, { lifecycle: services.lifecycle });
  await fastify.register(installationRoutes, { lifecycle: services.lifecycle, technicians: services.technicians });
  await fastify.register(searchRoutes, { router: services.router });
  await fastify.register(notificationRoutes, { fanout: services.fanout });
  await fastify.register(docsRoutes, { docs: services.docs });
  await fastify.register(adminRoutes, { propagator: services.propagator });

  return fastify;
}
