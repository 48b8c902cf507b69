/**
 * @fileoverview Advisor configuration
 *
 * - `schema`: zod schemas, defaults and the minimal-config derivation
 * - `env`: building config inputs from environment variables
 */

export {
  AdvisorConfigSchema,
  LifecycleOptionsSchema,
  FacadeOptionsSchema,
  QueryRequestSchema,
  ProviderSchema,
  PROVIDERS,
  DEFAULT_INIT_TIMEOUT_MS,
  DEFAULT_MINIMAL_INIT_TIMEOUT_MS,
  DEFAULT_CALL_TIMEOUT_MS,
  DEFAULT_STREAM_TIMEOUT_MS,
  DEFAULT_FALLBACK_CHUNK_SIZE,
  DEFAULT_FALLBACK_CHUNK_DELAY_MS,
  toMinimalConfig,
  formatIssues,
  type AdvisorConfig,
  type AdvisorConfigInput,
  type LifecycleOptions,
  type LifecycleOptionsInput,
  type FacadeOptions,
  type FacadeOptionsInput,
  type ProviderName,
} from './schema.js';

export { loadConfigFromEnv, loadLifecycleOptionsFromEnv, API_KEY_ENV } from './env.js';
