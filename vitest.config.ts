/**
 * Vitest Configuration
 *
 * Tests live under tests/ and mirror the src/ module layout.
 * Coverage: v8 provider with text, html, lcov reporters.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
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
