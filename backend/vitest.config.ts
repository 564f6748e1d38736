import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      reportsDirectory: './coverage',
      include: [
        'src/application/**/*.ts',
        'src/infrastructure/**/*.ts',
        'src/config/**/*.ts',
      ],
      exclude: [
        'src/__tests__/**',
        'src/**/*.d.ts',
        'src/index.ts',
      ],
    },
    setupFiles: ['./src/__tests__/setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
