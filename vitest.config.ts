import path from 'node:path';
import { defineConfig } from 'vitest/config';

const alias = {
  '@tablestore/resilient-http-core': path.resolve(__dirname, 'libs/resilient-http-core/src/index.ts'),
  '@tablestore/table-client': path.resolve(__dirname, 'libs/table-client/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
