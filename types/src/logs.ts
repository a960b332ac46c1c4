import { z } from 'zod';

// 로그 레벨 스키마
export const LogLevelSchema = z.enum(['ERROR', 'WARN', 'INFO', 'DEBUG']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

// 로그 카테고리 스키마
export const LogCategorySchema = z.enum(['api', 'cache', 'session', 'reaper', 'source', 'system', 'server']);
export type LogCategory = z.infer<typeof LogCategorySchema>;

// 단일 로그 항목 스키마 (로그 싱크로 전달되는 형태)
export const LogRecordSchema = z.object({
  level: LogLevelSchema,
  category: LogCategorySchema,
  message: z.string(),
  meta: z.unknown().optional(),
  timestamp: z.string(), // ISO 8601 형식
});
export type LogRecord = z.infer<typeof LogRecordSchema>;
