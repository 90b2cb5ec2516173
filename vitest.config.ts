import { fileURLToPath } from 'url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // CRITICAL: Enable proper isolation for mock cleanup
    isolate: true,              // Each test file in separate worker
    pool: 'threads',            // Use worker threads for isolation

    // Mock cleanup settings (call history only; vi.fn(impl) keeps its implementation)
    clearMocks: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'src/boot/main.ts',
        'coverage/**',
        'dist/**',
        'test/**',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@core': fromRoot('./src/core'),
      '@hardware': fromRoot('./src/hardware'),
      '@logging': fromRoot('./src/logging'),
      '@system': fromRoot('./src/system'),
      '@utils': fromRoot('./src/utils'),
      '@validation': fromRoot('./src/validation'),
      '$types': fromRoot('./src/types'),
      '$test-utils': fromRoot('./test'),
    },
  },
})
