import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared': path.resolve(__dirname, 'src/shared'),
      '@core': path.resolve(__dirname, 'src/pulse-core'),
      '@api': path.resolve(__dirname, 'src/pulse-api'),
      '@worker': path.resolve(__dirname, 'src/pulse-worker'),
      '@ui': path.resolve(__dirname, 'src/pulse-ui'),
      '@db': path.resolve(__dirname, 'src/db'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
