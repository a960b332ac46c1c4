import dotenv from 'dotenv';
import { z } from 'zod';
import ms from 'ms';
import path from 'path';
import { LogLevelSchema, type LogLevel } from '@vidgate/types';
import { backendRoot, projectRoot } from '../utils/dir.js';
import { setLogLevel } from '../utils/log.js';
//------------------------------------------------------------------------------//
dotenv.config({ path: path.resolve(backendRoot, '.env'), quiet: true });
dotenv.config({ path: path.resolve(projectRoot, '.env'), quiet: true });

// ms 라이브러리 형식의 시간 문자열을 검증하는 Zod 스키마
const msStringSchema = z
  .string()
  .refine(
    val => {
      try {
        const result = ms(val as ms.StringValue);
        return typeof result === 'number' && !isNaN(result) && result > 0;
      } catch {
        return false;
      }
    },
    { message: 'Invalid time format (e.g., "24h", "10s", "7d")' }
  )
  .transform(val => val as ms.StringValue);

// 환경 변수 Zod 스키마
const envSchema = z.object({
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().min(1).max(65535).default(4001),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
  LOG_LEVEL: z
    .string()
    .optional()
    .transform(v => (v === undefined ? undefined : v.trim().toUpperCase()))
    .pipe(LogLevelSchema.optional()),
  REQUEST_BODY_LIMIT: z.string().default('1mb'),
  FRONTEND_URL: z.url().default('http://127.0.0.1'),
  RATELIMIT_MAX: z.coerce.number().positive().default(100),
  RATELIMIT_WINDOWMS: msStringSchema.default('10s'),
  // 메타데이터 캐시
  CACHE_MAX_SIZE: z.coerce.number().int().positive().default(100),
  CACHE_TTL: msStringSchema.default('5m'),
  // 만료 캐시/세션 정리 주기
  REAPER_INTERVAL: msStringSchema.default('10m'),
  // yt-dlp 실행 파일 및 추출 타임아웃
  YTDLP_PATH: z.string().min(1).default('yt-dlp'),
  YTDLP_TIMEOUT: msStringSchema.default('30s'),
});

// 출력
export const env = envSchema.parse(process.env);
export type Environment = z.infer<typeof envSchema>;

// 유틸리티 함수
export const isProduction = env.NODE_ENV === 'production';
export const isDevelopment = env.NODE_ENV === 'development';
export const isTest = env.NODE_ENV === 'test';

// 로그 레벨: 명시값 > 환경별 기본값
export const logLevel: LogLevel = env.LOG_LEVEL ?? (isDevelopment ? 'DEBUG' : isTest ? 'WARN' : 'INFO');
setLogLevel(logLevel);

// 서비스 설정 (밀리초/초 단위로 변환)
export const serviceConfig = {
  cacheMaxSize: env.CACHE_MAX_SIZE,
  cacheTtlSeconds: Math.max(1, Math.floor(ms(env.CACHE_TTL) / 1000)),
  reaperIntervalMs: ms(env.REAPER_INTERVAL),
  ytDlpPath: env.YTDLP_PATH,
  ytDlpTimeoutMs: ms(env.YTDLP_TIMEOUT),
};
