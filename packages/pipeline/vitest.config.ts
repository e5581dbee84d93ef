import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      exclude: [
        'dist/**',
        'vitest.config.ts',
      ],
    },
  },
});
