import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'core',
    environment: 'node',
    // Mocks and console spies are module-wide; keep each file in its own fork
    pool: 'forks',
    // Ensure proper cleanup between tests
    sequence: {
      concurrent: false,
    },
  },
});
