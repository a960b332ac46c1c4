// Domain Layer - 순수 비즈니스 로직 (외부 의존성 없음)

export * from './types.js';
export * from './cache/index.js';
export * from './session/index.js';
