import { z } from 'zod';
import { SessionStateSchema } from './session.js';
import { VideoInfoSchema } from './media.js';

// 캐시 통계
export const CacheStatsSchema = z.object({
  size: z.number().int(),
  maxSize: z.number().int(),
  hitCount: z.number().int(),
  missCount: z.number().int(),
  hitRate: z.number(), // 백분율 (0 ~ 100)
  totalRequests: z.number().int(),
});
export type CacheStats = z.infer<typeof CacheStatsSchema>;

// 세션 저장소 통계
export const SessionStatsSchema = z.object({
  totalSessions: z.number().int(),
  premiumSessions: z.number().int(),
  bypassedSessions: z.number().int(),
});
export type SessionStats = z.infer<typeof SessionStatsSchema>;

export const CacheStatsResponseSchema = z.object({
  success: z.literal(true),
  cache: CacheStatsSchema,
  sessions: SessionStatsSchema,
});
export type CacheStatsResponse = z.infer<typeof CacheStatsResponseSchema>;

// 캐시 무효화 요청/응답
export const InvalidateCacheRequestSchema = z.object({
  url: z.string().min(1),
});
export type InvalidateCacheRequest = z.infer<typeof InvalidateCacheRequestSchema>;

export const InvalidateCacheResponseSchema = z.object({
  success: z.literal(true),
  removed: z.boolean(),
});
export type InvalidateCacheResponse = z.infer<typeof InvalidateCacheResponseSchema>;

export const ClearCacheResponseSchema = z.object({
  success: z.literal(true),
  message: z.string(),
});
export type ClearCacheResponse = z.infer<typeof ClearCacheResponseSchema>;

// 영상 정보 조회 응답
export const FetchResponseSchema = z.object({
  success: z.literal(true),
  cached: z.boolean(),
  video: VideoInfoSchema,
  session: SessionStateSchema,
});
export type FetchResponse = z.infer<typeof FetchResponseSchema>;
