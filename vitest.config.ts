import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.test.ts', 'apps/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.test.ts',
        '**/types.ts',
        '**/index.ts',
      ],
    },
    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: {
      '@flowgauge/core': fromRoot('./packages/core/src/index.ts'),
      '@flowgauge/geoip': fromRoot('./packages/geoip/src/index.ts'),
      '@flowgauge/shared': fromRoot('./packages/shared/src/index.ts'),
    },
  },
});
