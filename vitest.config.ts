import { defineConfig, type UserConfig } from 'vitest/config';

/**
 * Vitest configuration for the advisor bridge
 *
 * Test tiers controlled by FIQH_ADVISOR_TEST_MODE:
 * - 'unit' (default): no network, scripted boundaries and fake LLM adapters
 * - 'integration': also runs *.integration.test.ts
 */
export default defineConfig((): UserConfig => {
  const mode = process.env.FIQH_ADVISOR_TEST_MODE ?? 'unit';
  const exclude = ['**/node_modules/**', '**/dist/**'];
  if (mode === 'unit') {
    exclude.push('**/*.integration.test.ts');
  }

  return {
    test: {
      globals: true,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      exclude,
      setupFiles: ['./vitest.setup.ts'],
      testTimeout: 10000,
      hookTimeout: 10000,
      pool: 'forks',
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json', 'html'],
        exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
      },
    },
  };
});
