import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      'packages/core',
      'packages/extractor',
      'packages/scorer',
      'packages/runner',
      'packages/bootstrap',
      'packages/pipeline',
    ],
  },
});
