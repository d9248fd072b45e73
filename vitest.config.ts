import { defineConfig as defineBaseConfig } from '@figref/vitest-config';
import { defineConfig } from 'vitest/config';

const baseConfig = defineBaseConfig({
  test: {
    include: [
      'packages/*/src/**/*.{test,spec}.ts',
      'tools/*/src/**/*.{test,spec}.ts',
    ],
  },
});

export default defineConfig({
  ...baseConfig,
  test: {
    ...baseConfig.test,
    coverage: {
      ...baseConfig.test?.coverage,
      include: ['packages/*/src/**/*.ts', 'tools/*/src/**/*.ts'],
      exclude: ['**/index.ts', '**/types.ts', '**/*.test.ts'],
    },
  },
});
