import type { UserConfig } from 'vitest/config';

export const defineConfig = (options: UserConfig = {}): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      setupFiles: ['./vitest.setup.ts'],
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['packages/*/src/**/*.ts', 'tools/*/src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts'],
      },
      ...options.test,
    },
  };
};
