/**
 * Vite configuration for CommonJS build
 * Output: dist/cjs/
 */

import { defineConfig } from 'vite'
import { fileURLToPath } from 'url'
import dts from 'vite-plugin-dts'

const root = (path: string): string => fileURLToPath(new URL(`../${path}`, import.meta.url))

export default defineConfig({
  plugins: [
    dts({
      include: ['src/lib/**/*'],
      outDir: 'dist/cjs',
      entryRoot: 'src/lib',
      rollupTypes: false,
      tsconfigPath: './tsconfig.build.json'
    })
  ],
  build: {
    lib: {
      entry: root('src/lib/index.ts'),
      formats: ['cjs'],
      fileName: (_format, entryName) => `${entryName}.cjs`
    },
    outDir: root('dist/cjs'),
    emptyOutDir: true,
    sourcemap: true,
    minify: false,
    rollupOptions: {
      external: ['events', 'serialport', 'i2c-bus'],
      output: {
        format: 'cjs',
        preserveModules: true,
        preserveModulesRoot: 'src/lib',
        exports: 'named'
      }
    }
  }
})
