// Vitest configuration for mailmirror.
// Tests live beside the sources and run against in-memory SQLite.

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
  },
})
