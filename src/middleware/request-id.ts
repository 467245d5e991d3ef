import type { FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'node:crypto';

/** Accepts a caller's `x-request-id` or assigns one, and echoes it on the reply. */
export async function requestIdMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
) {
  const header = request.headers['x-request-id'];
  const id = typeof header === 'string' && header.length > 0 ? header : randomUUID();
  request.id = id;
  reply.header('x-request-id', id);
}
