import {defineConfig} from 'vitest/config';

export default defineConfig({
  test: {
    name: 'loglinear-histogram',
    include: ['src/**/*.test.ts'],
    benchmark: {
      include: ['src/**/*.bench.ts'],
    },
  },
});
