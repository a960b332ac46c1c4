import type { VideoInfo } from '@vidgate/types';
import { MetadataCache, type MetadataCacheOptions } from './services/cache/MetadataCache.js';
import { UsageSessionStore, type UsageSessionStoreOptions } from './services/session/UsageSessionStore.js';
import { Reaper } from './services/reaper.js';
import type { MediaSource } from './services/types.js';
//------------------------------------------------------------------------------//

/**
 * 요청 처리 경로 전체에 전달되는 서비스 묶음
 * 엔트리 포인트가 생성/소유하며, 종료 시 reaper를 멈춥니다.
 */
export interface AppContext {
  cache: MetadataCache<VideoInfo>;
  sessions: UsageSessionStore;
  reaper: Reaper;
  source: MediaSource;
}

export interface AppContextOptions {
  source: MediaSource;
  cache?: MetadataCacheOptions;
  sessions?: UsageSessionStoreOptions;
  reaperIntervalMs?: number;
  signal?: AbortSignal;
}

/**
 * 서비스 인스턴스 생성 (reaper는 start()를 호출해야 동작)
 */
export function createAppContext(options: AppContextOptions): AppContext {
  const cache = new MetadataCache<VideoInfo>(options.cache);
  const sessions = new UsageSessionStore(options.sessions);
  const reaper = new Reaper({
    cache,
    sessions,
    intervalMs: options.reaperIntervalMs,
    signal: options.signal,
  });

  return { cache, sessions, reaper, source: options.source };
}
