import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['./src/**/*.test.ts', './e2e/**/*.test.ts'],
    coverage: {
      include: ['src/**'],
      exclude: ['**/types/**', '**/*types.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
