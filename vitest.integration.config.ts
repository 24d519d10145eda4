import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'], // Only include integration tests
    pool: 'forks', // Use forks pool for isolation
    poolOptions: {
      forks: { singleFork: true }, // Run test files sequentially against the shared database
    },
    maxConcurrency: 1,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
  },
});
