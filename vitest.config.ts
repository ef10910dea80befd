import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/src/**/*.spec.ts', 'services/*/src/**/*.test.ts']
  },
  resolve: {
    alias: {
      '@skillgap/common': path.resolve(__dirname, 'services/common/src/index.ts')
    }
  }
});
