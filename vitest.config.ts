import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: ['test/**/*.test.{ts,tsx}'],
    environment: 'node',
    // ink renders only the final frame when it detects CI; tests read live frames
    env: { CI: 'false' },
  },
});
