import { type FastifyPluginAsync } from 'fastify';
import {
  CacheStatsResponseSchema,
  ClearCacheResponseSchema,
  InvalidateCacheRequestSchema,
  InvalidateCacheResponseSchema,
} from '@vidgate/types';
import type { ApiRoutesOptions } from './types.js';
import { logger, getRequestMeta } from '../utils/index.js';
//------------------------------------------------------------------------------//
export const cacheRoutes: FastifyPluginAsync<ApiRoutesOptions> = async (fastify, { context }) => {
  // 캐시 및 세션 통계
  fastify.get('/stats', async (_request, reply) => {
    const [cache, sessions] = await Promise.all([context.cache.stats(), context.sessions.stats()]);
    return reply.send(CacheStatsResponseSchema.parse({ success: true, cache, sessions }));
  });

  // 특정 URL 캐시 무효화
  fastify.post('/invalidate', async (request, reply) => {
    const { url } = InvalidateCacheRequestSchema.parse(request.body);
    const removed = await context.cache.invalidate(url);
    return reply.send(InvalidateCacheResponseSchema.parse({ success: true, removed }));
  });

  // 전체 캐시 삭제
  fastify.delete('/', async (request, reply) => {
    await context.cache.clear();
    logger.info('cache', 'Cache cleared via API', getRequestMeta(request));
    return reply.send(ClearCacheResponseSchema.parse({ success: true, message: 'Cache cleared' }));
  });
};
