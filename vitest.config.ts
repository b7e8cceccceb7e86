import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  resolve: {
    // monaco-editor only declares a "module" entry, no "main"
    mainFields: ['module', 'main'],
  },
  test: {
    // Component tests opt into jsdom with a per-file environment comment
    environment: 'node',
    include: ['src/**/*.test.{ts,tsx}', 'tools/**/*.test.ts'],
  },
});
