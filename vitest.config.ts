import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const pkg = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@mnemo/shared': pkg('./packages/shared/index.ts'),
      '@mnemo/ranking': pkg('./packages/ranking/src/index.ts'),
      '@mnemo/recall': pkg('./packages/recall/src/index.ts'),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
  },
});
