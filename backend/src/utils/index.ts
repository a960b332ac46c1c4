export * from './log.js';
export * from './mutex.js';
export * from './requestMeta.js';
export * from './dir.js';
export * from './disconnect.js';
