import { type FastifyPluginAsync } from 'fastify';
import type { ApiRoutesOptions } from './types.js';
import { videoRoutes } from './video.routes.js';
import { sessionRoutes } from './session.routes.js';
import { cacheRoutes } from './cache.routes.js';
import { healthRoutes } from './health.routes.js';

export type { ApiRoutesOptions } from './types.js';

export const apiRoutes: FastifyPluginAsync<ApiRoutesOptions> = async (fastify, { context }) => {
  await fastify.register(videoRoutes, { context });
  await fastify.register(sessionRoutes, { prefix: '/session', context });
  await fastify.register(cacheRoutes, { prefix: '/cache', context });
  await fastify.register(healthRoutes, { prefix: '/health', context });
};

export default apiRoutes;
