import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

export default defineConfig({
  resolve: {
    alias: {
      '@shared/types': path.resolve(__dirname, './shared/src/index.ts'),
    },
  },
  test: {
    include: ['src/**/*.{test,spec}.ts', 'shared/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    setupFiles: ['tests/setup-env.ts'],
    allowOnly: false,
    fileParallelism: false,
    isolate: true,
    testTimeout: 30000,
    hookTimeout: 30000,
    passWithNoTests: false,
  },
})
