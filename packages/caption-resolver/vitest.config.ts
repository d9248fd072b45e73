import { defineConfig as defineBaseConfig } from '@figref/vitest-config';
import { defineConfig } from 'vitest/config';

const baseConfig = defineBaseConfig();

export default defineConfig({
  ...baseConfig,
  test: {
    ...baseConfig.test,
    coverage: {
      ...baseConfig.test?.coverage,
      exclude: ['src/types.ts', 'src/index.ts', '**/*.test.ts'],
    },
  },
});
