import ms from 'ms';
import type { SessionStats } from '@vidgate/types';
import { identifyClient, systemClock, type Clock, type RateLimitStatus, type Session } from '../../domain/index.js';
import { logger, Mutex } from '../../utils/index.js';
//------------------------------------------------------------------------------//

export interface UsageSessionStoreOptions {
  /** 무료 사용자 일일 다운로드 한도 */
  dailyQuota?: number;
  /** 프리미엄 사용자에게 보고하는 남은 횟수 */
  premiumRemaining?: number;
  /** 일일 카운터 초기화 주기 (ms) */
  dailyWindowMs?: number;
  /** 마지막 접근 후 세션 삭제까지의 시간 (ms) */
  staleSessionAgeMs?: number;
  /** 지연 면제에 필요한 광고 시청 수 */
  bypassThreshold?: number;
  /** 지연 면제 유지 시간 (ms) */
  bypassWindowMs?: number;
  clock?: Clock;
}

/**
 * 클라이언트 사용량 세션 저장소
 *
 * 책임:
 * - 클라이언트(IP + User-Agent)별 다운로드 횟수 추적 및 일일 한도 판단
 * - 광고 시청 기반 지연 면제(bypass) 상태 관리
 * - 오래된 세션 정리
 *
 * 모르는 세션 ID에 대해서는 예외 대신 기본값을 반환합니다.
 * (지연 표시: true, 다운로드 한도: 제한 없음)
 */
export class UsageSessionStore {
  private sessions = new Map<string, Session>();
  private readonly mutex = new Mutex();
  private readonly clock: Clock;
  readonly dailyQuota: number;
  readonly premiumRemaining: number;
  private readonly dailyWindowMs: number;
  private readonly staleSessionAgeMs: number;
  private readonly bypassThreshold: number;
  private readonly bypassWindowMs: number;

  constructor(options: UsageSessionStoreOptions = {}) {
    this.dailyQuota = options.dailyQuota ?? 10;
    this.premiumRemaining = options.premiumRemaining ?? 999;
    this.dailyWindowMs = options.dailyWindowMs ?? ms('24h');
    this.staleSessionAgeMs = options.staleSessionAgeMs ?? ms('24h');
    this.bypassThreshold = options.bypassThreshold ?? 3;
    this.bypassWindowMs = options.bypassWindowMs ?? ms('30m');
    this.clock = options.clock ?? systemClock;
  }

  /**
   * 세션 조회 또는 생성
   * 기존 세션은 마지막 접근 시각을 갱신하고, 하루가 지났으면 일일 카운터를 초기화합니다.
   */
  getOrCreateSession(clientAddress: string, userAgent: string): Promise<Session> {
    return this.mutex.runExclusive(() => {
      const id = identifyClient(clientAddress, userAgent);
      const now = this.clock();
      const existing = this.sessions.get(id);

      if (!existing) {
        const session: Session = {
          id,
          createdAt: now,
          lastSeen: now,
          downloadCount: 0,
          fetchCount: 0,
          dailyDownloads: 0,
          lastReset: now,
          isPremium: false,
          adViews: 0,
          bypassUntil: null,
        };
        this.sessions.set(id, session);
        logger.debug('session', `Session created: ${id}`);
        return { ...session };
      }

      existing.lastSeen = now;

      if (now - existing.lastReset > this.dailyWindowMs) {
        existing.dailyDownloads = 0;
        existing.lastReset = now;
        logger.debug('session', `Daily counter reset: ${id}`);
      }

      return { ...existing };
    });
  }

  /**
   * 세션 조회 (접근 시각 갱신 없음)
   */
  getSession(id: string): Promise<Session | undefined> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(id);
      return session ? { ...session } : undefined;
    });
  }

  /**
   * 다운로드 횟수 증가
   */
  incrementDownload(id: string): Promise<void> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(id);
      if (session) {
        session.downloadCount++;
        session.dailyDownloads++;
      }
    });
  }

  /**
   * 영상 정보 조회 횟수 증가
   */
  incrementFetch(id: string): Promise<void> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(id);
      if (session) {
        session.fetchCount++;
      }
    });
  }

  /**
   * 광고 시청 횟수 증가
   * 기준 횟수 이상이면 호출될 때마다 면제 시간을 지금부터 다시 연장합니다.
   */
  incrementAdView(id: string): Promise<void> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(id);
      if (!session) {
        return;
      }

      session.adViews++;

      if (session.adViews >= this.bypassThreshold) {
        session.bypassUntil = this.clock() + this.bypassWindowMs;
        logger.debug('session', `Delay bypass granted: ${id}`, { adViews: session.adViews });
      }
    });
  }

  /**
   * 지연(광고) 표시 여부
   * 만료된 면제 상태는 이 호출에서 해제됩니다.
   */
  shouldShowDelay(id: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(id);
      if (!session) {
        return true;
      }

      if (session.isPremium) {
        return false;
      }

      if (session.bypassUntil !== null) {
        if (this.clock() < session.bypassUntil) {
          return false;
        }
        // 면제 만료
        session.bypassUntil = null;
      }

      return true;
    });
  }

  /**
   * 일일 다운로드 한도 상태
   */
  rateLimitStatus(id: string): Promise<RateLimitStatus> {
    return this.mutex.runExclusive((): RateLimitStatus => {
      const session = this.sessions.get(id);
      if (!session) {
        return { limited: false, remaining: this.dailyQuota };
      }

      if (session.isPremium) {
        return { limited: false, remaining: this.premiumRemaining };
      }

      const remaining = this.dailyQuota - session.dailyDownloads;
      return {
        limited: remaining <= 0,
        remaining: Math.max(0, remaining),
        resetTime: session.lastReset + this.dailyWindowMs,
      };
    });
  }

  /**
   * 프리미엄 여부 설정 (외부 결제 연동용)
   * @returns 세션 존재 여부
   */
  setPremium(id: string, isPremium: boolean): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const session = this.sessions.get(id);
      if (!session) {
        return false;
      }
      session.isPremium = isPremium;
      logger.info('session', `Premium ${isPremium ? 'enabled' : 'disabled'}: ${id}`);
      return true;
    });
  }

  /**
   * 오래된 세션 정리
   * @returns 정리된 세션 수
   */
  cleanupOldSessions(): Promise<number> {
    return this.mutex.runExclusive(() => {
      const cutoff = this.clock() - this.staleSessionAgeMs;
      const staleIds: string[] = [];

      for (const [id, session] of this.sessions.entries()) {
        if (session.lastSeen < cutoff) {
          staleIds.push(id);
        }
      }

      for (const id of staleIds) {
        this.sessions.delete(id);
      }

      if (staleIds.length > 0) {
        logger.info('session', `Cleaned up ${staleIds.length} old sessions`);
      }

      return staleIds.length;
    });
  }

  /**
   * 세션 통계
   */
  stats(): Promise<SessionStats> {
    return this.mutex.runExclusive(() => {
      const now = this.clock();
      const sessions = Array.from(this.sessions.values());
      return {
        totalSessions: sessions.length,
        premiumSessions: sessions.filter(s => s.isPremium).length,
        bypassedSessions: sessions.filter(s => s.bypassUntil !== null && now < s.bypassUntil).length,
      };
    });
  }

  /**
   * 세션 개수
   */
  get size(): number {
    return this.sessions.size;
  }
}
