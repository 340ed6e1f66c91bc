import { defineConfig } from 'vitest/config';
import os from 'os';
import path from 'path';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      TESTRELAY_LOG_DIR: path.join(os.tmpdir(), 'testrelay-test-logs')
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        'tests/**',
        '*.config.ts'
      ]
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    include: [
      'tests/**/*.test.ts'
    ],
    exclude: [
      'node_modules/**',
      'dist/**'
    ]
  }
});
