import path from 'path'

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Each test file in its own worker
    isolate: true,
    pool: 'threads',

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'coverage/**',
        'dist/**',
        'src/boot/main.ts',
        'src/hardware/radio/noble-radio.ts',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '$types': path.resolve(__dirname, './src/types'),
      '@boot': path.resolve(__dirname, './src/boot'),
      '@core': path.resolve(__dirname, './src/core'),
      '@events': path.resolve(__dirname, './src/events'),
      '@hardware': path.resolve(__dirname, './src/hardware'),
      '@logging': path.resolve(__dirname, './src/logging'),
      '@system': path.resolve(__dirname, './src/system'),
      '@telemetry': path.resolve(__dirname, './src/telemetry'),
      '@utils': path.resolve(__dirname, './src/utils'),
      '@validation': path.resolve(__dirname, './src/validation'),
    },
  },
})
