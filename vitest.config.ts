import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// Ensure a stable, writable temp directory for store fixtures and vitest internals.
const fallbackTmpDir = '/tmp';
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : fallbackTmpDir;
process.env.TMPDIR = resolvedTmpDir;
try {
  mkdirSync(resolvedTmpDir, { recursive: true });
} catch {
  // If we cannot create it, let vitest surface the error normally.
}

/**
 * Vitest configuration for the action engine.
 *
 * Stores under test are `:memory:` databases or files under TMPDIR; embedding
 * providers are in-process fakes.
 */
export default defineConfig(() => {
  const exclude = ['node_modules/**', 'dist/**'];

  return {
    test: {
      globals: true,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      exclude,
      setupFiles: ['./vitest.setup.ts'],
      testTimeout: 30000,
      hookTimeout: 10000,
      pool: 'forks' as const,
      coverage: {
        provider: 'v8' as const,
        reporter: ['text', 'json', 'html'],
        exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
      },
    },
  };
});
