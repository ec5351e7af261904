import { defineConfig } from 'vitest/config';

/**
 * Root configuration: each package under packages/ is a Vitest project
 * with its own vitest.config.ts.
 */
export default defineConfig({
  test: {
    projects: ['packages/*'],
    // No retries - surface issues immediately
    retry: 0,
    reporters: ['default'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
