import { type FastifyPluginAsync } from 'fastify';
import { HealthResponseSchema } from '@vidgate/types';
import type { ApiRoutesOptions } from './types.js';
//------------------------------------------------------------------------------//
export const healthRoutes: FastifyPluginAsync<ApiRoutesOptions> = async (fastify, { context }) => {
  // 헬스체크 엔드포인트
  fastify.get('/', async (_request, reply) => {
    const version = await context.source.getVersion();
    const body = HealthResponseSchema.parse({
      status: version ? 'ok' : 'unhealthy',
      ytDlp: { available: version !== null, version },
      uptime: Math.floor(process.uptime()),
    });

    return reply.code(version ? 200 : 503).send(body);
  });
};
