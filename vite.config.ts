import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';
import dts from 'vite-plugin-dts';
import type { Plugin } from 'vite';

const root = fileURLToPath(new URL('.', import.meta.url));

/**
 * Make sure the CLI chunk starts with a shebang line.
 */
function shebangPlugin(): Plugin {
  return {
    name: 'shebang',
    generateBundle(_options, bundle) {
      for (const [fileName, chunk] of Object.entries(bundle)) {
        if (fileName.startsWith('extsniff.cli') && chunk.type === 'chunk' && !chunk.code.startsWith('#!')) {
          chunk.code = '#!/usr/bin/env node\n' + chunk.code;
        }
      }
    },
  };
}

// Bundled ESM/CJS build; `npm run build` emits the plain tsc output instead
export default defineConfig({
  plugins: [
    dts({
      include: ['src/**/*'],
      tsconfigPath: 'tsconfig.build.json',
    }),
    shebangPlugin(),
  ],
  build: {
    outDir: 'bundle',
    lib: {
      entry: {
        extsniff: `${root}src/index.ts`,
        'extsniff.cli': `${root}src/bin.ts`,
      },
      formats: ['es', 'cjs'],
      fileName: (format, entryName) => {
        const ext = format === 'es' ? 'js' : 'cjs';
        return `${entryName}.${ext}`;
      },
    },
    rollupOptions: {
      external: [/^node:/, 'zod'],
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
