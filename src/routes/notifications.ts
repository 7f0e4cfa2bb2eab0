import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { NotificationFanout } from '../modules/notifications/index.js';
import { parseInput } from '../utils/validation.js';
import { callerId } from './context.js';

export interface NotificationRouteOptions {
  fanout: NotificationFanout;
}

const listQuerySchema = z.object({
  unread_only: z.enum(['true', 'false']).default('false'),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export async function notificationRoutes(fastify: FastifyInstance, { fanout }: NotificationRouteOptions): Promise<void> {
  fastify.get('/notifications', async (request) => {
    const query = parseInput(listQuerySchema, request.query, 'query string');
    const notifications = await fanout.list(callerId(request), {
      unreadOnly: query.unread_only === 'true',
      limit: query.limit,
    });
    return { notifications };
  });

  fastify.get('/notifications/unread-count', async (request) => {
    const count = await fanout.unreadCount(callerId(request));
    return { count };
  });

  fastify.post('/notifications/mark-read', async (request) => {
    const updated = await fanout.markRead(callerId(request), 'all');
    return { updated };
  });

  fastify.post<{ Params: { id: string } }>('/notifications/:id/mark-read', async (request) => {
    const updated = await fanout.markRead(callerId(request), request.params.id);
    return { updated };
  });
}
