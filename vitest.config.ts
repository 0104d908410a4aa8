// vitest.config.ts
// One run covers every workspace package's test directory.

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    pool: 'threads',
  },
});
