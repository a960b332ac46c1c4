export * from './types.js';
export * from './cache/MetadataCache.js';
export * from './session/UsageSessionStore.js';
export * from './reaper.js';
export * from './videoInfo.js';
export * from './fetch.js';
export * from './usage.js';
