/**
 * Centralized Vitest setup for the advisor bridge
 *
 * In 'unit' mode (default) the global fetch rejects, so a test that forgets
 * to inject a fake HTTP client fails fast instead of reaching a provider.
 */

import { afterEach, vi } from 'vitest';
import { clearLlmServiceAdapter } from './src/adapters/llm_service.js';

const TEST_MODE = process.env.FIQH_ADVISOR_TEST_MODE ?? 'unit';

if (TEST_MODE === 'unit') {
  vi.stubGlobal(
    'fetch',
    vi.fn(async () => {
      throw new Error('network disabled in unit tests: inject a fetch implementation');
    })
  );
}

afterEach(() => {
  clearLlmServiceAdapter();
});
