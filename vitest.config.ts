import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    // 1. Force Vitest to ignore build artifacts
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**'
    ],
    // 2. Only source tests
    include: ['packages/**/*.{test,spec}.ts'],
  },
  // 3. Resolve the shared workspace package from source
  resolve: {
    alias: {
      '@minutes-pipeline/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url))
    }
  }
});
