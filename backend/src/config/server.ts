import ms from 'ms';
import { z } from 'zod';
import { env, isDevelopment, isProduction } from './env.js';
import { logger } from '../utils/index.js';
import type { LogLevel } from '@vidgate/types';
//------------------------------------------------------------------------------//
// Pino 레벨 -> 프로젝트 레벨 매핑
const pinoLevelToLogLevel = (level: number): LogLevel => {
  if (level >= 50) {
    return 'ERROR';
  } // error, fatal
  if (level >= 40) {
    return 'WARN';
  } // warn
  if (level >= 30) {
    return 'INFO';
  } // info
  return 'DEBUG'; // debug, trace
};

const LOG_METHOD = {
  ERROR: logger.error,
  WARN: logger.warn,
  INFO: logger.info,
  DEBUG: logger.debug,
} as const satisfies Record<LogLevel, typeof logger.info>;

// pino JSON 한 줄 (필요한 필드만 검증, 나머지는 메타데이터로 유지)
const PinoLineSchema = z.looseObject({
  level: z.number().default(30),
  msg: z.string().default('Fastify log'),
});

// 불필요한 필드 제거 후 메타데이터로 전달
const EXCLUDED_KEYS = new Set(['level', 'msg', 'time', 'pid', 'hostname']);

// Fastify 커스텀 로거 스트림 (pino JSON 출력을 프로젝트 로거로 전달)
export const fastifyLoggerStream = {
  write(msg: string) {
    try {
      const line = PinoLineSchema.parse(JSON.parse(msg));
      const meta = Object.fromEntries(Object.entries(line).filter(([key]) => !EXCLUDED_KEYS.has(key)));
      LOG_METHOD[pinoLevelToLogLevel(line.level)]('server', line.msg, Object.keys(meta).length > 0 ? meta : undefined);
    } catch {
      logger.info('server', msg.trim());
    }
  },
};

// "1mb", "512kb" 형식 → 바이트
const parseBodyLimit = (value: string): number => {
  const match = value.trim().toLowerCase().match(/^(\d+)\s*(kb|mb)?$/);
  if (!match) {
    return 1024 * 1024;
  }
  const amount = parseInt(match[1], 10);
  return match[2] === 'mb' ? amount * 1024 * 1024 : match[2] === 'kb' ? amount * 1024 : amount;
};

export const fastifyConfig = {
  bodyLimit: parseBodyLimit(env.REQUEST_BODY_LIMIT),
  logger: {
    level: isDevelopment ? 'debug' : 'info',
    stream: fastifyLoggerStream,
  },
};

export const corsConfig = {
  origin: isDevelopment ? true : env.FRONTEND_URL,
  credentials: true,
  exposedHeaders: ['Content-Disposition'],
};

export const helmetConfig = {
  // JSON API와 미디어 스트림만 제공
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
      ...(isProduction && { upgradeInsecureRequests: [] }),
    },
  },
  crossOriginEmbedderPolicy: false,
  // 다운로드 응답을 다른 출처(프론트엔드)에서 받을 수 있도록 허용
  crossOriginResourcePolicy: { policy: 'cross-origin' as const },
};

export const rateLimitConfig = {
  max: env.RATELIMIT_MAX,
  timeWindow: ms(env.RATELIMIT_WINDOWMS),
};
