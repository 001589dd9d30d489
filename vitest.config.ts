import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Pattern for test discovery
    include: ['tests/**/*.test.ts'],

    // Global test helpers (describe/it/expect)
    globals: true,

    // Test isolation
    isolate: true,

    // Filesystem tests use their own temp dirs, but keep ordering predictable
    sequence: {
      concurrent: false,
    },

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts', // Entry point
        'dist/**',
        'tests/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
    },
  },
});
