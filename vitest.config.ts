import { defineConfig } from 'vitest/config';

// 테스트는 빌드 산출물이 아닌 TypeScript 소스를 직접 실행합니다.
export default defineConfig({
  test: {
    include: ['backend/src/test/**/*.test.ts', 'types/src/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
    },
  },
});
