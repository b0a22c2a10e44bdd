import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 30000,
    env: {
      NODE_ENV: 'test',
      JWT_SECRET: 'test-secret',
      BCRYPT_ROUNDS: '4',
      SMS_RETRY_DELAY_MS: '10',
      RATE_LIMIT_ENABLED: 'false',
      UPLOAD_DIR: path.join(os.tmpdir(), 'award-applications-test-uploads'),
    },
  },
});
