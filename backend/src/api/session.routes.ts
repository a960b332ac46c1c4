import { type FastifyPluginAsync } from 'fastify';
import { AdViewResponseSchema, SessionResponseSchema } from '@vidgate/types';
import type { ApiRoutesOptions } from './types.js';
import { getSessionState, resolveClientSession } from '../services/index.js';
import { logger, getRequestMeta } from '../utils/index.js';
//------------------------------------------------------------------------------//
const toIsoOrNull = (value: number | null): string | null => (value === null ? null : new Date(value).toISOString());

export const sessionRoutes: FastifyPluginAsync<ApiRoutesOptions> = async (fastify, { context }) => {
  // 현재 클라이언트 세션 상태
  fastify.get('/', async (request, reply) => {
    const session = await resolveClientSession(context.sessions, getRequestMeta(request));
    const state = await getSessionState(context.sessions, session.id);

    return reply.send(
      SessionResponseSchema.parse({
        success: true,
        session: {
          ...state,
          isPremium: session.isPremium,
          downloadCount: session.downloadCount,
          dailyDownloads: session.dailyDownloads,
          fetchCount: session.fetchCount,
          adViews: session.adViews,
          bypassUntil: toIsoOrNull(session.bypassUntil),
          createdAt: new Date(session.createdAt).toISOString(),
          lastSeen: new Date(session.lastSeen).toISOString(),
        },
      })
    );
  });

  // 광고 시청 기록 (기준 횟수 이상이면 지연 면제)
  fastify.post('/ad-view', async (request, reply) => {
    const meta = getRequestMeta(request);
    const { id } = await resolveClientSession(context.sessions, meta);
    await context.sessions.incrementAdView(id);

    const session = await context.sessions.getSession(id);
    const showDelay = await context.sessions.shouldShowDelay(id);

    logger.debug('session', 'Ad view recorded', { sessionId: id, adViews: session?.adViews });

    return reply.send(
      AdViewResponseSchema.parse({
        success: true,
        adViews: session?.adViews ?? 0,
        showDelay,
        bypassUntil: toIsoOrNull(session?.bypassUntil ?? null),
      })
    );
  });
};
