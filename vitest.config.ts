import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts', 'apps/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Outbound network is blocked for every suite
    setupFiles: ['apps/harvester/src/test-no-network.setup.ts'],
    testTimeout: 10000,
  },
})
