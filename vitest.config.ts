import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolveDir = (dir: string): string => fileURLToPath(new URL(`./${dir}/`, import.meta.url));

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['json-summary', 'text', 'lcov'],
      include: ['src'],
      exclude: ['__tests__', '__mocks__', 'src/types'],
    },
    setupFiles: ['__tests__/_setup'],
    include: ['__tests__/**/*.test.ts'],
    forceRerunTriggers: ['**/vitest.config.*/**', '**/__mocks__/**/*', '__tests__/_setup.ts'],
    alias: {
      '@/tests/': resolveDir('__tests__'),
      '@/mocks/': resolveDir('__mocks__'),
      '@/': resolveDir('src'),
    },
  },
});
