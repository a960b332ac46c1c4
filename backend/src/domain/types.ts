//------------------------------------------------------------------------------//
// 도메인 타입 (시각은 모두 epoch 밀리초)
//------------------------------------------------------------------------------//

/**
 * 현재 시각 공급자 (테스트에서 교체 가능)
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * 캐시 항목
 */
export interface CacheEntry<T> {
  key: string;
  value: T;
  createdAt: number;
  expiresAt: number;
  /** 진단용 원본 입력 */
  sourceLocator: string;
}

/**
 * 클라이언트 사용량 세션
 */
export interface Session {
  id: string;
  createdAt: number;
  lastSeen: number;
  downloadCount: number;
  fetchCount: number;
  dailyDownloads: number;
  /** 일일 카운터 기준 시각 */
  lastReset: number;
  isPremium: boolean;
  adViews: number;
  /** 광고 시청으로 얻은 지연 면제 만료 시각 */
  bypassUntil: number | null;
}

export interface RateLimitStatus {
  limited: boolean;
  remaining: number;
  resetTime?: number;
}
