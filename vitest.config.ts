import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.spec.ts', 'apps/*/src/**/__tests__/**/*.test.ts'],
  },
  esbuild: { target: 'es2022' },
})
