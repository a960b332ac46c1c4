import type { FastifyRequest, FastifyReply } from 'fastify';

/**
 * 404 핸들러
 */
export async function notFoundHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply.code(404).send({
    error: 'Not Found',
    message: `Route ${request.method}:${request.url} not found`,
  });
}
