import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const resolve = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^src\//, replacement: resolve('./src/') },
      { find: /^types$/, replacement: resolve('./types.ts') },
      { find: /^index$/, replacement: resolve('./index.ts') },
      { find: /^parser$/, replacement: resolve('./parser.ts') },
    ],
  },
  test: {
    include: ['test/**/*.test.ts'],
  },
});
