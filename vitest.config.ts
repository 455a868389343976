import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Path resolution
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./frontend', import.meta.url)),
    },
  },

  test: {
    environment: 'jsdom',
    setupFiles: ['./frontend/shared/test/setup.ts'],
    include: ['frontend/**/*.test.ts'],
  },
});
