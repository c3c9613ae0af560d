import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // PixiJS expects browser globals even when nothing is rendered.
    environment: 'jsdom',
    include: ['src/**/*.test.ts'],
  },
});
