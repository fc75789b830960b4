import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';
import dts from 'vite-plugin-dts';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  plugins: [
    dts({
      include: ['src/**/*'],
      outDir: 'dist-bundle',
    }),
  ],
  build: {
    outDir: 'dist-bundle',
    lib: {
      entry: resolve(root, 'src/index.ts'),
      fileName: 'ta-crypto',
      formats: ['es'],
    },
    rollupOptions: {
      external: [/^@noble\//, /^@scure\//],
    },
  },
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
