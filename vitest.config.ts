import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    // Нативные грамматики tree-sitter грузятся медленно на холодном старте.
    testTimeout: 20_000,
  },
});
