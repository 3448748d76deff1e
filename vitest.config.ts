import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      DNSSWITCH_LOG_DIR: path.join(os.tmpdir(), 'dnsswitch-test-logs'),
      DNSSWITCH_DATA_DIR: path.join(os.tmpdir(), 'dnsswitch-test-data'),
    },
  },
});
