import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@libs/core': path.resolve(__dirname, 'libs/core/src'),
      '@libs/signals': path.resolve(__dirname, 'libs/signals/src'),
      '@libs/binance': path.resolve(__dirname, 'libs/binance/src'),
      '@libs/telegram': path.resolve(__dirname, 'libs/telegram/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['test/**/*.spec.ts'],
  },
});
