import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const srcDir = fileURLToPath(new URL('./src/', import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    testTimeout: 10_000,
  },
  resolve: {
    alias: [
      // '@/x/y.js' -> src/x/y.ts
      { find: /^@\/(.+)\.js$/, replacement: `${srcDir}$1.ts` },
      // Resolve .js imports to .ts sources (NodeNext moduleResolution)
      { find: /^(\..+)\.js$/, replacement: '$1.ts' },
    ],
  },
});
