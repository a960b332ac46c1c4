import type { LogLevel, LogCategory, LogRecord } from '@vidgate/types';

//------------------------------------------------------------------------------//
// 로그 싱크 (기본값: 콘솔 출력, 테스트에서는 교체 가능)
export type LogSink = (record: LogRecord) => void;

const LEVEL_RANK: Record<LogLevel, number> = { ERROR: 0, WARN: 1, INFO: 2, DEBUG: 3 };

let threshold: LogLevel = 'INFO';

const formatMeta = (meta: unknown): string => {
  if (meta === undefined) {
    return '';
  }
  if (meta instanceof Error) {
    return ` ${meta.stack ?? meta.message}`;
  }
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [meta:unstringifiable]';
  }
};

const consoleSink: LogSink = record => {
  const line = `${record.timestamp} [${record.level}] [${record.category}] ${record.message}${formatMeta(record.meta)}`;
  if (record.level === 'ERROR') {
    console_error(line);
  } else if (record.level === 'WARN') {
    console_warn(line);
  } else if (record.level === 'DEBUG') {
    console_debug(line);
  } else {
    console_log(line);
  }
};

let sink: LogSink = consoleSink;

export const setLogSink = (fn: LogSink | null) => {
  sink = fn ?? consoleSink;
};

export const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

// 로그
const log = (level: LogLevel, category: LogCategory, message: string, meta?: unknown): void => {
  if (LEVEL_RANK[level] > LEVEL_RANK[threshold]) {
    return;
  }
  sink({ level, category, message, meta, timestamp: new Date().toISOString() });
};

export const logger = {
  error: (category: LogCategory, message: string, meta?: unknown) => log('ERROR', category, message, meta),
  warn: (category: LogCategory, message: string, meta?: unknown) => log('WARN', category, message, meta),
  info: (category: LogCategory, message: string, meta?: unknown) => log('INFO', category, message, meta),
  debug: (category: LogCategory, message: string, meta?: unknown) => log('DEBUG', category, message, meta),
};

//------------------------------------------------------------------------------//
// 콘솔 로그 유틸 (ESLint no-console 규칙 무시)

/* eslint-disable no-console */
export const console_log = (...args: unknown[]): void => {
  console.log(...args);
};

export const console_error = (...args: unknown[]): void => {
  console.error(...args);
};

export const console_warn = (...args: unknown[]): void => {
  console.warn(...args);
};

export const console_debug = (...args: unknown[]): void => {
  console.debug(...args);
};
/* eslint-enable no-console */
