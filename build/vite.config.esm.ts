/**
 * Vite configuration for ESM build (tree-shakeable)
 * Output: dist/esm/
 */

import { defineConfig } from 'vite'
import { fileURLToPath } from 'url'
import dts from 'vite-plugin-dts'

const root = (path: string): string => fileURLToPath(new URL(`../${path}`, import.meta.url))

export default defineConfig({
  plugins: [
    dts({
      include: ['src/lib/**/*'],
      outDir: 'dist/esm',
      entryRoot: 'src/lib',
      rollupTypes: false,
      tsconfigPath: './tsconfig.build.json'
    })
  ],
  build: {
    lib: {
      entry: root('src/lib/index.ts'),
      formats: ['es'],
      fileName: (_format, entryName) => `${entryName}.js`
    },
    outDir: root('dist/esm'),
    emptyOutDir: true,
    sourcemap: true,
    minify: false,
    rollupOptions: {
      external: ['events', 'serialport', 'i2c-bus'],
      output: {
        format: 'es',
        preserveModules: true,
        preserveModulesRoot: 'src/lib',
        exports: 'named'
      }
    }
  }
})
