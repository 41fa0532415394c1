import { resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const root = fileURLToPath(new URL('.', import.meta.url))

export default defineConfig({
  build: {
    lib: {
      entry: resolve(root, 'src/cli.ts'),
      formats: ['es'],
      fileName: 'pipeline-cli',
    },
    rollupOptions: {
      external: [/^node:/, 'js-yaml', 'picocolors', /^@stdio-pipeline\//],
    },
    ssr: true,
    target: 'node20',
    outDir: 'dist',
    emptyOutDir: true,
  },
  test: {
    name: 'pipeline-cli',
    environment: 'node',
    testTimeout: 15_000,
  },
})
