import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/integration/**/*.test.ts'],
    testTimeout: 30000, // full pipeline runs against a stubbed geocoder
    hookTimeout: 10000,
  },
});
