import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ttk91web/core-ttk91': path.resolve(root, 'packages/core-ttk91/src/index.ts'),
      '@ttk91web/assembler-ttk91': path.resolve(root, 'packages/assembler-ttk91/src/index.ts'),
      '@ttk91web/debug-bridge': path.resolve(root, 'packages/debug-bridge/src/index.ts')
    }
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts']
  }
});
