import type { FastifyInstance } from 'fastify';
import {
  activityInputSchema,
  leadInputSchema,
  leadListQuerySchema,
  leadPatchSchema,
  markLostSchema,
  offerDecisionSchema,
  offerInputSchema,
  offerPatchSchema,
  sendOfferSchema,
  versionSchema,
  type LifecycleService,
} from '../modules/lifecycle/index.js';
import { parseInput } from '../utils/validation.js';
import { optionalCallerId } from './context.js';

export interface SalesRouteOptions {
  lifecycle: LifecycleService;
}

type IdParams = { Params: { id: string } };

export async function salesRoutes(fastify: FastifyInstance, { lifecycle }: SalesRouteOptions): Promise<void> {
  // Leads
  fastify.get('/sales/leads', async (request) => {
    const query = parseInput(leadListQuerySchema, request.query, 'query string');
    return lifecycle.listLeads(query);
  });

  fastify.post('/sales/leads', async (request, reply) => {
    const input = parseInput(leadInputSchema, request.body);
    const lead = await lifecycle.createLead(input);
    return reply.status(201).send(lead);
  });

  fastify.get<IdParams>('/sales/leads/:id', async (request) => {
    const lead = await lifecycle.getLead(request.params.id);
    const activities = await lifecycle.listActivities(lead.id);
    return { ...lead, activities };
  });

  fastify.put<IdParams>('/sales/leads/:id', async (request) => {
    const patch = parseInput(leadPatchSchema, request.body);
    return lifecycle.updateLeadDetails(request.params.id, patch);
  });

  fastify.post<IdParams>('/sales/leads/:id/contact', async (request) => {
    const { version } = parseInput(versionSchema, request.body ?? {});
    return lifecycle.contactLead(request.params.id, { expectedVersion: version });
  });

  fastify.post<IdParams>('/sales/leads/:id/qualify', async (request) => {
    const { version } = parseInput(versionSchema, request.body ?? {});
    return lifecycle.qualifyLead(request.params.id, { expectedVersion: version });
  });

  fastify.post<IdParams>('/sales/leads/:id/lost', async (request) => {
    const { version, reason } = parseInput(markLostSchema, request.body ?? {});
    return lifecycle.markLeadLost(request.params.id, reason, { expectedVersion: version });
  });

  fastify.post<IdParams>('/sales/leads/:id/convert', async (request) => {
    const { version } = parseInput(versionSchema, request.body ?? {});
    return lifecycle.convertLead(request.params.id, { expectedVersion: version });
  });

  // Activity log
  fastify.get<IdParams>('/sales/leads/:id/activity', async (request) => {
    const activities = await lifecycle.listActivities(request.params.id);
    return { activities };
  });

  fastify.post<IdParams>('/sales/leads/:id/activity', async (request, reply) => {
    const input = parseInput(activityInputSchema, request.body);
    const activity = await lifecycle.logActivity(request.params.id, input, optionalCallerId(request));
    return reply.status(201).send(activity);
  });

  // Offers
  fastify.get<IdParams>('/sales/leads/:id/offers', async (request) => {
    const offers = await lifecycle.listOffers(request.params.id);
    return { offers };
  });

  fastify.post<IdParams>('/sales/leads/:id/offers', async (request, reply) => {
    const input = parseInput(offerInputSchema, request.body);
    const offer = await lifecycle.createOffer(request.params.id, input);
    return reply.status(201).send(offer);
  });

  fastify.get<IdParams>('/sales/offers/:id', async (request) => {
    return lifecycle.getOffer(request.params.id);
  });

  fastify.put<IdParams>('/sales/offers/:id', async (request) => {
    const patch = parseInput(offerPatchSchema, request.body);
    return lifecycle.updateOfferDraft(request.params.id, patch);
  });

  fastify.post<IdParams>('/sales/offers/:id/send', async (request) => {
    const { version, valid_until } = parseInput(sendOfferSchema, request.body ?? {});
    return lifecycle.sendOffer(request.params.id, { expectedVersion: version, validUntil: valid_until });
  });

  fastify.post<IdParams>('/sales/offers/:id/status', async (request) => {
    const { version, status } = parseInput(offerDecisionSchema, request.body);
    return lifecycle.setOfferStatus(request.params.id, status, { expectedVersion: version });
  });
}
