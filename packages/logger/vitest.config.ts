import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'logger',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
