export * from './logs.js';
export * from './media.js';
export * from './session.js';
export * from './cache.js';
export * from './health.js';
