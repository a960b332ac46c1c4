import Fastify from 'fastify';
import cors from '@fastify/cors';
import compress from '@fastify/compress';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import apiRoutes from './api/index.js';
import type { AppContext } from './context.js';
import { fastifyConfig, helmetConfig, rateLimitConfig, corsConfig } from './config/index.js';
import { notFoundHandler, errorHandler } from './handlers/index.js';
//------------------------------------------------------------------------------//

// Fastify 서버 생성
export async function createFastifyApp(context: AppContext) {
  const fastify = Fastify(fastifyConfig);

  await fastify.register(helmet, helmetConfig);
  await fastify.register(rateLimit, rateLimitConfig);
  await fastify.register(compress);
  await fastify.register(cors, corsConfig);
  await fastify.register(apiRoutes, { prefix: '/api', context }); // API 라우트

  fastify.setNotFoundHandler(notFoundHandler); // 404 핸들러
  fastify.setErrorHandler(errorHandler); // 전역 에러 핸들러

  return fastify;
}

export type FastifyApp = Awaited<ReturnType<typeof createFastifyApp>>;
