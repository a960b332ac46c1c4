import { type FastifyPluginAsync } from 'fastify';
import {
  DownloadRequestSchema,
  FetchRequestSchema,
  FetchResponseSchema,
  RateLimitedResponseSchema,
  SubtitleDownloadRequestSchema,
} from '@vidgate/types';
import type { ApiRoutesOptions } from './types.js';
import {
  fetchVideoInfo,
  getSessionState,
  resolveClientSession,
  serializeRateLimit,
  toContentDisposition,
  toSafeFilename,
  type SubtitleExt,
} from '../services/index.js';
import { logger, getRequestMeta, abortOnDisconnect } from '../utils/index.js';
//------------------------------------------------------------------------------//
// 확장자별 Content-Type
const MEDIA_TYPES: Record<string, string> = {
  mp4: 'video/mp4',
  webm: 'video/webm',
  m4a: 'audio/mp4',
  opus: 'audio/ogg',
};

// 자막 확장자별 Content-Type
const SUBTITLE_TYPES: Record<SubtitleExt, string> = {
  srt: 'application/x-subrip; charset=utf-8',
  vtt: 'text/vtt; charset=utf-8',
};

export const videoRoutes: FastifyPluginAsync<ApiRoutesOptions> = async (fastify, { context }) => {
  /**
   * 영상 정보 조회 (캐시 우선)
   * POST /fetch
   */
  fastify.post('/fetch', async (request, reply) => {
    const { url } = FetchRequestSchema.parse(request.body);
    const meta = getRequestMeta(request);

    const session = await resolveClientSession(context.sessions, meta);
    await context.sessions.incrementFetch(session.id);

    const { video, cached } = await fetchVideoInfo(context, url, abortOnDisconnect(reply.raw));
    const state = await getSessionState(context.sessions, session.id);

    logger.info('api', `Video info served${cached ? ' from cache' : ''}: ${url}`, { sessionId: session.id });

    return reply.send(
      FetchResponseSchema.parse({
        success: true,
        cached,
        video,
        session: state,
      })
    );
  });

  /**
   * 선택한 포맷 다운로드 (일일 한도 적용)
   * POST /download
   */
  fastify.post('/download', async (request, reply) => {
    const { url, formatId } = DownloadRequestSchema.parse(request.body);
    const meta = getRequestMeta(request);

    const session = await resolveClientSession(context.sessions, meta);
    const status = await context.sessions.rateLimitStatus(session.id);

    if (status.limited) {
      logger.warn('api', 'Download rate limited', { ...meta, sessionId: session.id });
      return reply.code(429).send(
        RateLimitedResponseSchema.parse({
          error: 'Rate limited',
          rateLimit: serializeRateLimit(status),
        })
      );
    }

    // 파일명과 포맷 확인용 (대부분 캐시 적중)
    const { video } = await fetchVideoInfo(context, url, abortOnDisconnect(reply.raw));
    const format = Object.values(video.formats)
      .flatMap(list => list ?? [])
      .find(f => f.formatId === formatId);

    if (!format) {
      return reply.code(400).send({ error: `Format ${formatId} is not available for this video` });
    }

    const filename = toSafeFilename(video.title, format.ext);

    await context.sessions.incrementDownload(session.id);
    logger.info('api', `Download started: ${filename}`, { url, formatId, sessionId: session.id });

    const stream = context.source.openDownload(url, format);

    return reply
      .code(200)
      .header('Content-Type', MEDIA_TYPES[format.ext] ?? 'application/octet-stream')
      .header('Content-Disposition', toContentDisposition(filename))
      .header('Cache-Control', 'no-store')
      .send(stream);
  });

  /**
   * 자막 파일 다운로드 (다운로드 한도에 포함)
   * POST /download-subtitle
   */
  fastify.post('/download-subtitle', async (request, reply) => {
    const { url, lang } = SubtitleDownloadRequestSchema.parse(request.body);
    const meta = getRequestMeta(request);

    const session = await resolveClientSession(context.sessions, meta);
    const status = await context.sessions.rateLimitStatus(session.id);

    if (status.limited) {
      logger.warn('api', 'Subtitle download rate limited', { ...meta, sessionId: session.id });
      return reply.code(429).send(
        RateLimitedResponseSchema.parse({
          error: 'Rate limited',
          rateLimit: serializeRateLimit(status),
        })
      );
    }

    const signal = abortOnDisconnect(reply.raw);
    const { video } = await fetchVideoInfo(context, url, signal);
    const subtitle = await context.source.downloadSubtitle(url, lang, signal);
    const filename = toSafeFilename(video.title, `${lang}.${subtitle.ext}`);

    await context.sessions.incrementDownload(session.id);
    logger.info('api', `Subtitle served: ${filename}`, { url, lang, sessionId: session.id });

    return reply
      .code(200)
      .header('Content-Type', SUBTITLE_TYPES[subtitle.ext])
      .header('Content-Disposition', toContentDisposition(filename))
      .header('Cache-Control', 'no-store')
      .send(subtitle.content);
  });
};
