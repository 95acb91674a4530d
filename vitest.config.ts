import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.{test,spec}.ts',
        'src/api/start.ts',
        // Rena typfiler (ingen körbar kod)
        'src/models/**/*.ts',
      ]
    },
    pool: 'forks', // better-sqlite3 är ett native-tillägg, isolera per process
  }
});
