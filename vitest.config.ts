import { createRequire } from 'node:module'
import { defineConfig } from 'vitest/config'

const require = createRequire(import.meta.url)

export default defineConfig({
  resolve: {
    // drizzle-kit's ESM build of its API cannot require Node built-ins; load the CJS build
    alias: [{ find: /^drizzle-kit\/api$/, replacement: require.resolve('drizzle-kit/api') }],
  },
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
})
