import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@cohort/core': pkg('core'),
      '@cohort/query-expressions': pkg('query-expressions'),
      '@cohort/cli': pkg('cli'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
  },
})
