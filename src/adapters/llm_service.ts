import { AsyncLocalStorage } from 'node:async_hooks';

export interface LlmChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmChatOptions {
  provider: string;
  modelId?: string;
  messages: LlmChatMessage[];
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface LlmChatResult {
  content: string;
  provider: string;
}

export interface LlmProviderHealth {
  provider: string;
  available: boolean;
  authenticated: boolean;
  lastCheck: number;
  error?: string;
}

export interface LlmServiceAdapter {
  chat(options: LlmChatOptions): Promise<LlmChatResult>;
  checkHealth(provider: string, forceCheck?: boolean): Promise<LlmProviderHealth>;
}

let llmServiceAdapter: LlmServiceAdapter | null = null;
const adapterStore = new AsyncLocalStorage<LlmServiceAdapter>();

function validateAdapter(adapter: LlmServiceAdapter): void {
  if (!adapter || typeof adapter.chat !== 'function' || typeof adapter.checkHealth !== 'function') {
    throw new Error('llm_adapter_invalid: Adapter must implement chat and checkHealth.');
  }
}

export interface RegisterLlmServiceAdapterOptions {
  force?: boolean;
}

export function registerLlmServiceAdapter(
  adapter: LlmServiceAdapter,
  options: RegisterLlmServiceAdapterOptions = {}
): void {
  validateAdapter(adapter);
  if (llmServiceAdapter && !options.force) {
    throw new Error('llm_adapter_already_registered');
  }
  llmServiceAdapter = adapter;
}

export function getLlmServiceAdapter(): LlmServiceAdapter | null {
  return adapterStore.getStore() ?? llmServiceAdapter;
}

/**
 * Explicit adapter first, then the scoped one, then the registered one,
 * then whatever `fallback` builds.
 */
export function resolveLlmServiceAdapter(
  adapter: LlmServiceAdapter | null | undefined,
  fallback: () => LlmServiceAdapter
): LlmServiceAdapter {
  const candidate = adapter ?? getLlmServiceAdapter() ?? fallback();
  validateAdapter(candidate);
  return candidate;
}

export function withLlmServiceAdapter<T>(adapter: LlmServiceAdapter, fn: () => T): T {
  validateAdapter(adapter);
  return adapterStore.run(adapter, fn);
}

export function clearLlmServiceAdapter(): void {
  llmServiceAdapter = null;
}
