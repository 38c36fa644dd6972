import { defineConfig } from 'vitest/config';

import { defineConfig as defineBaseConfig } from './tools/vitest-config/src/index';

export default defineConfig(
  defineBaseConfig({
    test: {
      include: [
        'packages/*/src/**/*.{test,spec}.ts',
        'tools/*/src/**/*.{test,spec}.ts',
      ],
    },
  }),
);
