import path from 'node:path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@jobfit/common': path.resolve(__dirname, 'services/common/src/index.ts')
    }
  },
  test: {
    environment: 'node',
    include: ['services/*/src/**/*.{test,spec}.ts'],
    restoreMocks: true
  }
});
