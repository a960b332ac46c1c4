import type { AppContext } from '../context.js';

// 모든 API 라우트 플러그인에 전달되는 옵션
export interface ApiRoutesOptions {
  context: AppContext;
}
