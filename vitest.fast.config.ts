import { defineConfig } from 'vitest/config'
import tsconfigPaths from 'vite-tsconfig-paths'

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: [
      'tests/slow/**',
      'node_modules/**',
    ],
    coverage: {
      enabled: false,
    },
  },
})
