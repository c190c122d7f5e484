/**
 * Vitest Configuration
 *
 * Tests live under tests/, mirroring src/:
 * - tests/lexer: scanner, token readers, errors
 * - tests/cli: argument parsing, formatting, config, read-print loop
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
    },
  },
});
