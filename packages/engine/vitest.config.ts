import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'engine',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
