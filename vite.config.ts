import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';
import dts from 'vite-plugin-dts';
import type { Plugin } from 'vite';

const srcDir = fileURLToPath(new URL('./src/', import.meta.url));

/**
 * Rollup plugin to prepend a shebang line to the CLI chunk.
 */
function shebangPlugin(): Plugin {
  return {
    name: 'shebang',
    generateBundle(_options, bundle) {
      for (const [fileName, chunk] of Object.entries(bundle)) {
        if (fileName.startsWith('mime-entry.cli') && chunk.type === 'chunk' && !chunk.code.startsWith('#!')) {
          chunk.code = '#!/usr/bin/env node\n' + chunk.code;
        }
      }
    },
  };
}

export default defineConfig({
  plugins: [
    dts({
      include: ['src/**/*'],
      outDir: 'dist',
    }),
    shebangPlugin(),
  ],
  build: {
    // Shares dist/ with the tsc build; the CLI reads ../package.json from here
    outDir: 'dist',
    emptyOutDir: false,
    lib: {
      entry: {
        'mime-entry': `${srcDir}index.ts`,
        'mime-entry.cli': `${srcDir}cli.ts`,
      },
      formats: ['es', 'cjs'],
      fileName: (format, entryName) => {
        const ext = format === 'es' ? 'js' : 'cjs';
        return `${entryName}.${ext}`;
      },
    },
    rollupOptions: {
      external: ['content-type', 'node:fs', 'node:url'],
      output: {
        preserveModules: false,
        exports: 'named',
      },
    },
    sourcemap: true,
    minify: 'esbuild',
    target: 'es2022',
  },
});
