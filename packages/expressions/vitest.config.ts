import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'expressions',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
