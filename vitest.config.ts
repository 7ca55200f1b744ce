import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    globals: true,
    include: ['packages/*/__tests__/**/*.spec.ts'],
    // PBKDF2 at the default cost runs a few hundred ms per derivation
    testTimeout: 60_000,
    environment: 'node'
  }
});
