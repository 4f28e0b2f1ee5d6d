import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.test.ts',
        'src/test-helpers.ts',
        'src/server/standalone.ts',
      ],
    },
    // Isolate test files so fake timers and console spies never leak between them
    isolate: true,
    // Fail fast on first error during CI
    bail: process.env.CI ? 1 : 0,
  },
})
