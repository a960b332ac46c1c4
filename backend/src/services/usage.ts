import type { RateLimitStatus as RateLimitStatusResponse, SessionState } from '@vidgate/types';
import type { RateLimitStatus, Session } from '../domain/index.js';
import type { UsageSessionStore } from './session/UsageSessionStore.js';
import type { RequestMeta } from '../utils/index.js';
//------------------------------------------------------------------------------//

/**
 * 요청 메타데이터로 클라이언트 세션 조회/생성
 */
export function resolveClientSession(sessions: UsageSessionStore, meta: RequestMeta): Promise<Session> {
  return sessions.getOrCreateSession(meta.ip, meta.userAgent ?? '');
}

/**
 * 한도 상태 직렬화 (시각 → ISO 8601)
 */
export function serializeRateLimit(status: RateLimitStatus): RateLimitStatusResponse {
  return {
    limited: status.limited,
    remaining: status.remaining,
    ...(status.resetTime !== undefined && { resetTime: new Date(status.resetTime).toISOString() }),
  };
}

/**
 * 클라이언트에 노출할 세션 상태 (지연 표시 여부 + 한도)
 * 두 값은 각각 별도의 시점에서 읽힙니다.
 */
export async function getSessionState(sessions: UsageSessionStore, id: string): Promise<SessionState> {
  const showDelay = await sessions.shouldShowDelay(id);
  const rateLimit = await sessions.rateLimitStatus(id);
  return { id, showDelay, rateLimit: serializeRateLimit(rateLimit) };
}
