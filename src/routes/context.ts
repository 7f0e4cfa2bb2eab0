import type { FastifyRequest } from 'fastify';
import { ValidationError } from '../errors.js';

/** The caller's user id as set by the gateway in front of this service, if any. */
export function optionalCallerId(request: FastifyRequest): string | null {
  const header = request.headers['x-user-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value || null;
}

export function callerId(request: FastifyRequest): string {
  const value = optionalCallerId(request);

  if (!value) {
    throw new ValidationError('Missing x-user-id header');
  }
  return value;
}
