import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/unit/**/*.test.ts', 'tests/integration/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/index.ts', // barrels
        'src/**/types.ts',
        'src/bin.ts',
      ],
    },
    // Integration runs scan temp projects and load the bundled store
    testTimeout: 15000,
  },
});
