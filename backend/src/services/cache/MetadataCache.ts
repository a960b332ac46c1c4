import type { CacheStats } from '@vidgate/types';
import { normalizeLocator, systemClock, type CacheEntry, type Clock } from '../../domain/index.js';
import { logger, Mutex } from '../../utils/index.js';
//------------------------------------------------------------------------------//

export interface MetadataCacheOptions {
  /** 최대 항목 수 */
  maxSize?: number;
  /** 기본 TTL (초) */
  defaultTtlSeconds?: number;
  clock?: Clock;
}

/**
 * 영상 메타데이터 캐시 (TTL + LRU)
 *
 * 책임:
 * - 같은 영상에 대한 반복 추출 요청 방지 (URL 정규화 키 사용)
 * - 만료 항목 제거, 용량 초과 시 가장 오래 사용하지 않은 항목부터 제거
 *
 * Map의 삽입 순서를 최근 사용 순서로 사용합니다 (마지막 = 가장 최근).
 * 제거는 남은 TTL과 무관하게 사용 순서만 따릅니다.
 * 모든 연산은 저장소 단위 잠금 안에서 실행됩니다.
 */
export class MetadataCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private readonly mutex = new Mutex();
  private readonly clock: Clock;
  private hitCount = 0;
  private missCount = 0;
  readonly maxSize: number;
  readonly defaultTtlSeconds: number;

  constructor(options: MetadataCacheOptions = {}) {
    this.maxSize = Math.max(1, Math.floor(options.maxSize ?? 100));
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? 300; // 5분
    this.clock = options.clock ?? systemClock;
  }

  /**
   * 캐시 조회
   * @returns 없거나 만료된 경우 undefined
   */
  get(locator: string): Promise<T | undefined> {
    return this.mutex.runExclusive(() => {
      const key = normalizeLocator(locator);
      const entry = this.cache.get(key);

      if (entry) {
        if (this.clock() < entry.expiresAt) {
          // 최근 사용으로 이동
          this.cache.delete(key);
          this.cache.set(key, entry);
          this.hitCount++;
          logger.debug('cache', `Cache hit for ${key}`, { hits: this.hitCount, misses: this.missCount });
          return entry.value;
        }

        this.cache.delete(key);
        logger.debug('cache', `Cache expired for ${key}`);
      }

      this.missCount++;
      return undefined;
    });
  }

  /**
   * 캐시 저장
   * @param ttlSeconds 생략하거나 0 이하이면 기본 TTL 사용
   */
  set(locator: string, value: T, ttlSeconds?: number): Promise<void> {
    return this.mutex.runExclusive(() => {
      const key = normalizeLocator(locator);
      const ttl = ttlSeconds !== undefined && ttlSeconds > 0 ? ttlSeconds : this.defaultTtlSeconds;
      const now = this.clock();

      // 덮어쓰기도 최근 사용 위치로 이동해야 하므로 먼저 제거
      this.cache.delete(key);
      this.cache.set(key, {
        key,
        value,
        createdAt: now,
        expiresAt: now + ttl * 1000,
        sourceLocator: locator,
      });

      while (this.cache.size > this.maxSize) {
        const oldestKey = this.cache.keys().next().value;
        if (oldestKey === undefined) {
          break;
        }
        this.cache.delete(oldestKey);
        logger.debug('cache', `Evicted least recently used entry: ${oldestKey}`);
      }

      logger.debug('cache', `Cached ${key} for ${ttl} seconds`);
    });
  }

  /**
   * 특정 항목 삭제
   * @returns 삭제 전 존재 여부
   */
  invalidate(locator: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const key = normalizeLocator(locator);
      const removed = this.cache.delete(key);
      if (removed) {
        logger.info('cache', `Invalidated cache for ${key}`);
      }
      return removed;
    });
  }

  /**
   * 전체 삭제 (통계 포함)
   */
  clear(): Promise<void> {
    return this.mutex.runExclusive(() => {
      this.cache.clear();
      this.hitCount = 0;
      this.missCount = 0;
      logger.info('cache', 'Cache cleared');
    });
  }

  /**
   * 만료 항목 정리 (남은 항목의 순서는 유지)
   * @returns 삭제된 항목 수
   */
  cleanupExpired(): Promise<number> {
    return this.mutex.runExclusive(() => {
      const now = this.clock();
      const expiredKeys: string[] = [];

      for (const [key, entry] of this.cache.entries()) {
        if (now >= entry.expiresAt) {
          expiredKeys.push(key);
        }
      }

      for (const key of expiredKeys) {
        this.cache.delete(key);
      }

      if (expiredKeys.length > 0) {
        logger.info('cache', `Cleaned up ${expiredKeys.length} expired entries`);
      }

      return expiredKeys.length;
    });
  }

  /**
   * 캐시 통계
   */
  stats(): Promise<CacheStats> {
    return this.mutex.runExclusive(() => {
      const totalRequests = this.hitCount + this.missCount;
      const hitRate = totalRequests > 0 ? Math.round((this.hitCount / totalRequests) * 10000) / 100 : 0;

      return {
        size: this.cache.size,
        maxSize: this.maxSize,
        hitCount: this.hitCount,
        missCount: this.missCount,
        hitRate,
        totalRequests,
      };
    });
  }

  /**
   * 현재 항목 키 (오래된 순)
   */
  keys(): Promise<string[]> {
    return this.mutex.runExclusive(() => Array.from(this.cache.keys()));
  }
}
