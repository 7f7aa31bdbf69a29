import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts', 'bot/test/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent'
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks'
  },
  resolve: {
    alias: {
      '@autodeploy/logger': root('./packages/logger/src/index.ts'),
      '@autodeploy/config': root('./packages/config/src/index.ts'),
      '@autodeploy/gitops': root('./packages/gitops/src/index.ts')
    }
  }
});
