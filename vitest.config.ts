import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/__tests__/**',
        'src/cli/**',
        'src/server.ts',
      ],
      thresholds: {
        lines: 60,
        branches: 50,
        functions: 60,
      },
      reporter: ['text', 'lcov'],
    },
  },
});
