import type { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import { ZodError } from 'zod';
import { logger } from '../utils/index.js';
import { isDevelopment } from '../config/index.js';

/**
 * 전역 에러 핸들러
 * - 요청 검증 실패(Zod)는 400과 문제 목록 반환
 * - 4xx 에러는 메시지를 그대로 반환
 * - 5xx 에러는 개발 환경에서만 상세 메시지와 스택 트레이스 반환
 */
export async function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof ZodError) {
    logger.warn('api', `Invalid request: ${request.method} ${request.url}`);
    return reply.code(400).send({
      error: 'Invalid request',
      issues: error.issues.map(issue => ({ path: issue.path.map(String).join('.'), message: issue.message })),
    });
  }

  const statusCode = error.statusCode ?? 500;

  if (statusCode < 500) {
    logger.warn('api', `${request.method} ${request.url} -> ${statusCode}: ${error.message}`);
    return reply.code(statusCode).send({ error: error.message });
  }

  logger.error('server', 'Unhandled error:', error);

  return reply.code(statusCode).send({
    error: isDevelopment ? error.message : 'Internal server error',
    ...(isDevelopment && { stack: error.stack }),
  });
}
