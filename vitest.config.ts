import { defineConfig } from 'vitest/config'

/** Vitest configuration, kept apart from the library build. */
export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
})
