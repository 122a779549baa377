import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(__dirname, 'src')
    }
  },
  test: {
    environment: 'node',
    env: { NODE_ENV: 'test' },
    include: ['src/**/__tests__/**/*.test.ts']
  }
});
