import type { AdvisorConfigInput, LifecycleOptionsInput, ProviderName } from './schema.js';
import { PROVIDERS } from './schema.js';

type Env = Record<string, string | undefined>;

/** Environment variable holding each provider's API key. */
export const API_KEY_ENV: Record<Exclude<ProviderName, 'mock'>, string> = {
  groq: 'GROQ_API_KEY',
  openai: 'OPENAI_API_KEY',
  grok: 'XAI_API_KEY',
};

function readFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function readInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some((provider) => provider === value);
}

/**
 * Build a config input from environment variables. The result is validated by
 * the lifecycle; only an unknown FIQH_ADVISOR_PROVIDER is rejected here.
 */
export function loadConfigFromEnv(env: Env = process.env): AdvisorConfigInput {
  const apiKeys: Record<string, string> = {};
  for (const [provider, variable] of Object.entries(API_KEY_ENV)) {
    const key = readString(env[variable]);
    if (key) apiKeys[provider] = key;
  }

  const requested = readString(env.FIQH_ADVISOR_PROVIDER)?.toLowerCase();
  let preferredProvider: ProviderName;
  if (requested && isProviderName(requested)) {
    preferredProvider = requested;
  } else if (requested) {
    throw new Error(
      `FIQH_ADVISOR_PROVIDER must be one of ${PROVIDERS.join(', ')} (got "${requested}")`
    );
  } else {
    // Prefer the first provider with a key; mock otherwise.
    preferredProvider = (['groq', 'openai', 'grok'] as const).find((p) => apiKeys[p]) ?? 'mock';
  }

  const config: AdvisorConfigInput = {
    apiKeys,
    preferredProvider,
    enableChainFeatures: readFlag(env.FIQH_ADVISOR_ENABLE_CHAIN) ?? false,
  };
  const modelName = readString(env.FIQH_ADVISOR_MODEL);
  if (modelName) config.modelName = modelName;
  const vectorStoreUrl = readString(env.FIQH_ADVISOR_VECTOR_STORE_URL);
  if (vectorStoreUrl) config.vectorStoreUrl = vectorStoreUrl;
  const chainRpcUrl = readString(env.FIQH_ADVISOR_CHAIN_RPC_URL);
  if (chainRpcUrl) config.chainRpcUrl = chainRpcUrl;
  const storagePath = readString(env.FIQH_ADVISOR_STORAGE_PATH);
  if (storagePath) config.storagePath = storagePath;
  return config;
}

export function loadLifecycleOptionsFromEnv(env: Env = process.env): LifecycleOptionsInput {
  const options: LifecycleOptionsInput = {};
  const initTimeoutMs = readInt(env.FIQH_ADVISOR_INIT_TIMEOUT_MS);
  if (initTimeoutMs !== undefined && initTimeoutMs > 0) options.initTimeoutMs = initTimeoutMs;
  const minimal = readFlag(env.FIQH_ADVISOR_MINIMAL_FALLBACK);
  if (minimal !== undefined) options.minimalFallback = minimal;
  return options;
}
