import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const src = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@stepwise\/core\/test$/, replacement: src('core/src/test.ts') },
      { find: /^@stepwise\/core$/, replacement: src('core/src/index.ts') },
      { find: /^@stepwise\/cache$/, replacement: src('cache/src/index.ts') },
      { find: /^@stepwise\/redis$/, replacement: src('redis/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
