import { defineConfig } from 'vitest/config'
import { resolve } from 'path'
import { fileURLToPath } from 'url'

const root = fileURLToPath(new URL('.', import.meta.url))

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['packages/**/__tests__/**/*.test.{ts,tsx}'],
  },
  resolve: {
    // Tests run against TypeScript source without a prior build.
    alias: [
      {
        find: /^@presence-feed\/react$/,
        replacement: resolve(root, 'packages/react-presence-feed/src/index.ts'),
      },
      {
        find: /^@presence-feed\/core$/,
        replacement: resolve(root, 'packages/presence-feed/src/index.ts'),
      },
    ],
  },
})
