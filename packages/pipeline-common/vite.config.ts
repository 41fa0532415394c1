import { builtinModules } from 'node:module'
import { defineConfig } from 'vitest/config'

const builtins = [...builtinModules, ...builtinModules.map((moduleName) => `node:${moduleName}`)]

export default defineConfig({
  build: {
    target: 'node20',
    lib: {
      entry: 'src/index.ts',
      formats: ['es'],
      fileName: 'index',
    },
    sourcemap: true,
    rollupOptions: {
      external: [...builtins, 'picocolors'],
    },
  },
  test: {
    name: 'pipeline-common',
    environment: 'node',
  },
})
