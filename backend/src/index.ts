import { createFastifyApp, type FastifyApp } from './app.js';
import { createAppContext, type AppContext } from './context.js';
import { YtDlpClient } from './infrastructure/index.js';
import { logger } from './utils/index.js';
import { env, serviceConfig } from './config/index.js';
//------------------------------------------------------------------------------//

// 서버 시작 함수
async function startServer(host: string, port: number, context: AppContext) {
  logger.info('system', `Starting server... [Environment: ${env.NODE_ENV}]`);
  const fastify = await createFastifyApp(context);

  const ytDlpVersion = await context.source.getVersion();
  if (ytDlpVersion) {
    logger.info('system', `yt-dlp detected: ${ytDlpVersion}`);
  } else {
    logger.warn('system', `yt-dlp not found at "${serviceConfig.ytDlpPath}"; extraction requests will fail`);
  }

  context.reaper.start();
  await fastify.listen({ port, host });
  logger.info('system', `Server is running on http://${host}:${port}`);

  return fastify;
}

// Graceful shutdown 핸들러
async function gracefulShutdown(fastify: FastifyApp, shutdown: AbortController, signal: string) {
  logger.warn('system', `Received ${signal}: shutting down server...`);

  try {
    shutdown.abort(); // 주기 정리 작업 중지
    await fastify.close(); // Fastify 서버 종료 (진행 중인 요청 완료 대기)
    logger.info('system', 'Server closed successfully');
    process.exitCode = 0;
  } catch (error) {
    logger.error('system', 'Error during graceful shutdown:', error);
    process.exitCode = 1;
  }
}

// 메인 엔트리 포인트
async function main() {
  const shutdown = new AbortController();
  const context = createAppContext({
    source: new YtDlpClient({ binaryPath: serviceConfig.ytDlpPath, timeoutMs: serviceConfig.ytDlpTimeoutMs }),
    cache: { maxSize: serviceConfig.cacheMaxSize, defaultTtlSeconds: serviceConfig.cacheTtlSeconds },
    reaperIntervalMs: serviceConfig.reaperIntervalMs,
    signal: shutdown.signal,
  });

  try {
    const fastify = await startServer(env.HOST, env.PORT, context);

    // 시그널 핸들러 등록
    process.once('SIGINT', () => {
      void gracefulShutdown(fastify, shutdown, 'SIGINT');
    });
    process.once('SIGTERM', () => {
      void gracefulShutdown(fastify, shutdown, 'SIGTERM');
    });
  } catch (error) {
    shutdown.abort();
    logger.error('system', 'Failed to start server:', error);
    process.exitCode = 1;
  }
}

// 서버 시작
void main();
