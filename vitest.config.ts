import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      IMAGE_HASH_MODE: 'hex',
      IMAGE_HASH_ALGORITHM: 'difference',
      IMAGE_HASH_DISTANCE_STRATEGY: 'popcount',
      IMAGE_HASH_SIMILARITY_THRESHOLD: '10'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.config.ts',
        '**/*.d.ts',
        'tests/**',
      ],
    },
    // Include TypeScript files
    include: ['tests/**/*.{test,spec}.ts'],
  },
});
