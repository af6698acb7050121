import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/**/src/**/*.{test,spec}.ts', 'examples/dev-server/src/**/*.{test,spec}.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
    },
  },
  resolve: {
    alias: [
      { find: /^@spedisci\/core\/testing$/, replacement: fromRoot('./packages/core/src/testing/index.ts') },
      { find: /^@spedisci\/core$/, replacement: fromRoot('./packages/core/src/index.ts') },
      { find: /^@spedisci\/adapters-gls-italy$/, replacement: fromRoot('./packages/adapters/gls-italy/src/index.ts') },
      { find: /^@spedisci\/adapters-google-geocoding$/, replacement: fromRoot('./packages/adapters/google-geocoding/src/index.ts') },
    ],
  },
});
