import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cli',
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      // Tests run against core's sources; its package exports point at dist/.
      '@specrefine/core': new URL('../core/src/index.ts', import.meta.url)
        .pathname,
    },
  },
});
