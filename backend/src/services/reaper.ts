import ms from 'ms';
import type { MetadataCache } from './cache/MetadataCache.js';
import type { UsageSessionStore } from './session/UsageSessionStore.js';
import { logger } from '../utils/index.js';
//------------------------------------------------------------------------------//

export interface ReaperOptions {
  cache: Pick<MetadataCache<unknown>, 'cleanupExpired'>;
  sessions: Pick<UsageSessionStore, 'cleanupOldSessions'>;
  /** 정리 주기 (ms, 기본 10분) */
  intervalMs?: number;
  /** 중단 시 정리 작업도 멈춤 (프로세스 종료 신호 연결용) */
  signal?: AbortSignal;
}

export interface ReaperResult {
  expiredEntries: number;
  staleSessions: number;
}

/**
 * 만료 캐시 항목 / 오래된 세션 주기 정리
 *
 * 한 번의 실행이 실패해도 예외를 호출자로 전파하지 않고 다음 주기는 그대로 유지됩니다.
 */
export class Reaper {
  private readonly cache: ReaperOptions['cache'];
  private readonly sessions: ReaperOptions['sessions'];
  private readonly signal?: AbortSignal;
  readonly intervalMs: number;
  private cleanupInterval: NodeJS.Timeout | null = null;
  private running: Promise<ReaperResult | null> | null = null;

  constructor(options: ReaperOptions) {
    this.cache = options.cache;
    this.sessions = options.sessions;
    this.intervalMs = options.intervalMs ?? ms('10m');
    this.signal = options.signal;
  }

  /**
   * 정리 작업 시작 (주기적으로 실행)
   */
  start(): void {
    if (this.cleanupInterval || this.signal?.aborted) {
      return;
    }

    this.cleanupInterval = setInterval(() => {
      // runOnce는 자체적으로 실패를 기록하므로 거부되지 않음
      void this.runOnce();
    }, this.intervalMs);

    this.signal?.addEventListener('abort', this.onAbort, { once: true });

    logger.info('reaper', `Cleanup task started (every ${ms(this.intervalMs, { long: true })})`);
  }

  /**
   * 정리 작업 중지
   */
  stop(): void {
    this.signal?.removeEventListener('abort', this.onAbort);

    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
      logger.info('reaper', 'Cleanup task stopped');
    }
  }

  get isRunning(): boolean {
    return this.cleanupInterval !== null;
  }

  /**
   * 한 번 정리 실행
   * 이전 실행이 아직 진행 중이면 그 결과를 공유합니다.
   * @returns 실패 시 null
   */
  runOnce(): Promise<ReaperResult | null> {
    if (!this.running) {
      this.running = this.sweep().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async sweep(): Promise<ReaperResult | null> {
    try {
      const expiredEntries = await this.cache.cleanupExpired();
      const staleSessions = await this.sessions.cleanupOldSessions();
      logger.info('reaper', `Periodic cleanup: ${expiredEntries} expired cache entries, ${staleSessions} old sessions`);
      return { expiredEntries, staleSessions };
    } catch (error) {
      logger.error('reaper', 'Error in periodic cleanup:', error);
      return null;
    }
  }

  private readonly onAbort = (): void => {
    this.stop();
  };
}
