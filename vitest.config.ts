import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/**/__tests__/**/*.test.ts'],
    env: {
      SERVER_LOG_DIR: path.join(os.tmpdir(), 'daily-translation-test-logs'),
    },
  },
});
