/**
 * Vitest Configuration
 *
 * Tests live under tests/ and import describe/it/expect from 'vitest'.
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
