import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'jsdom',
    setupFiles: ['./vitest.setup.ts'],
    include: ['pages/**/__tests__/**/*.test.{ts,tsx}', 'bin/**/__tests__/**/*.test.ts']
  }
});
