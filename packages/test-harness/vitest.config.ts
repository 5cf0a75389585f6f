import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const fromRoot = (path: string) => fileURLToPath(new URL(`../../${path}`, import.meta.url));

export default defineConfig({
  root: fromRoot(''),
  resolve: {
    alias: {
      '@holdtype/core': fromRoot('packages/core/src/index.ts'),
      '@holdtype/platform-linux': fromRoot('packages/platform-linux/src/index.ts'),
      '@holdtype/platform': fromRoot('packages/platform/src/index.ts'),
    },
  },
  test: {
    include: ['packages/test-harness/src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json-summary'],
      include: [
        'packages/core/src/**/*.ts',
        'packages/platform-linux/src/**/*.ts',
        'apps/daemon/src/**/*.ts',
      ],
    },
  },
});
