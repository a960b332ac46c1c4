import { z } from 'zod';

// 일일 다운로드 제한 상태
export const RateLimitStatusSchema = z.object({
  limited: z.boolean(),
  remaining: z.number().int().min(0),
  resetTime: z.string().optional(), // ISO 8601 형식
});
export type RateLimitStatus = z.infer<typeof RateLimitStatusSchema>;

// 클라이언트에 노출되는 세션 상태
export const SessionStateSchema = z.object({
  id: z.string(),
  showDelay: z.boolean(),
  rateLimit: RateLimitStatusSchema,
});
export type SessionState = z.infer<typeof SessionStateSchema>;

// 세션 상세 조회 응답
export const SessionResponseSchema = z.object({
  success: z.literal(true),
  session: SessionStateSchema.extend({
    isPremium: z.boolean(),
    downloadCount: z.number().int(),
    dailyDownloads: z.number().int(),
    fetchCount: z.number().int(),
    adViews: z.number().int(),
    bypassUntil: z.string().nullable(),
    createdAt: z.string(),
    lastSeen: z.string(),
  }),
});
export type SessionResponse = z.infer<typeof SessionResponseSchema>;

// 광고 시청 기록 응답
export const AdViewResponseSchema = z.object({
  success: z.literal(true),
  adViews: z.number().int(),
  showDelay: z.boolean(),
  bypassUntil: z.string().nullable(),
});
export type AdViewResponse = z.infer<typeof AdViewResponseSchema>;

// 다운로드 제한 초과 응답 (429)
export const RateLimitedResponseSchema = z.object({
  error: z.literal('Rate limited'),
  rateLimit: RateLimitStatusSchema,
});
export type RateLimitedResponse = z.infer<typeof RateLimitedResponseSchema>;
