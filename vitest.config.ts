import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  test: {
    environment: 'node',
    include: ['**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['json-summary', 'text', 'lcov'],
      reportsDirectory: './coverage',
      include: [
        'observer/src/**',
        'receiver/src/**',
        'packages/shared/src/**',
        'packages/k8s-client/src/**'
      ],
      exclude: ['**/node_modules/**', '**/dist/**', '**/__tests__/**']
    }
  },
  resolve: {
    alias: {
      '@ingress-observer/shared': fromRoot('./packages/shared/src'),
      '@ingress-observer/k8s-client': fromRoot(
        './packages/k8s-client/src/index.ts'
      ),
      '@kubernetes/client-node': fromRoot(
        './__mocks__/@kubernetes/client-node.ts'
      )
    }
  }
})
