import type { ViteUserConfig as UserConfig } from 'vitest/config';

/**
 * Shared Vitest defaults for every workspace.
 *
 * `options.test` is merged over the defaults; other keys replace them.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts'],
      },
      ...options.test,
    },
  };
};
