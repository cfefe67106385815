import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  build: {
    outDir: 'dist',
    target: 'node20',
    // Single ES module for the library entry; zod stays a runtime dependency
    lib: {
      entry: resolve(root, 'src/convection/index.ts'),
      formats: ['es'],
      fileName: 'ice-shell-convection',
    },
    rollupOptions: {
      external: ['zod'],
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'scripts/**/*.test.ts'],
  },
});
