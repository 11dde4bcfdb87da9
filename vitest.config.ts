import { fileURLToPath } from 'url'

import { defineConfig } from 'vitest/config'

// Daylight-saving zone so wall-clock tests meet repeated and skipped hours
process.env.TZ = 'America/New_York'

function src(dir: string): string {
  return fileURLToPath(new URL('./src/' + dir, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,
    unstubGlobals: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'coverage/**',
        'src/boot/main.ts',
      ],
      thresholds: {
        branches: 90,
        functions: 95,
        lines: 95,
        statements: 95,
      },
    },

    include: ['src/**/*.test.ts'],
  },
  resolve: {
    // Mirrors compilerOptions.paths in tsconfig.json
    alias: {
      '$types': src('types'),
      '@boot': src('boot'),
      '@core': src('core'),
      '@features': src('features'),
      '@logging': src('logging'),
      '@notify': src('notify'),
      '@system': src('system'),
      '@utils': src('utils'),
      '@validation': src('validation'),
      '@weather': src('weather'),
    },
  },
})
