/**
 * @fileoverview LLM service over OpenAI-compatible chat completion APIs.
 *
 * Groq, OpenAI and xAI (grok) all accept the same `/chat/completions`
 * request shape, so one client covers the three providers.
 */

import { z } from 'zod';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import type { LlmChatOptions, LlmChatResult, LlmProviderHealth, LlmServiceAdapter } from './llm_service.js';

export type HttpProvider = 'groq' | 'openai' | 'grok';

export interface ProviderEndpoint {
  baseUrl: string;
  defaultModel: string;
}

export const PROVIDER_ENDPOINTS: Readonly<Record<HttpProvider, ProviderEndpoint>> = {
  groq: { baseUrl: 'https://api.groq.com/openai/v1', defaultModel: 'llama-3.3-70b-versatile' },
  openai: { baseUrl: 'https://api.openai.com/v1', defaultModel: 'gpt-4o-mini' },
  grok: { baseUrl: 'https://api.x.ai/v1', defaultModel: 'grok-beta' },
};

export function isHttpProvider(provider: string): provider is HttpProvider {
  return Object.hasOwn(PROVIDER_ENDPOINTS, provider);
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

export interface HttpLlmServiceOptions {
  apiKeys: Readonly<Record<string, string>>;
  fetch?: typeof fetch;
  /** Per-request timeout; 0 disables it. */
  requestTimeoutMs?: number;
  healthCheckIntervalMs?: number;
  endpoints?: Partial<Record<HttpProvider, ProviderEndpoint>>;
}

export class HttpLlmService implements LlmServiceAdapter {
  private readonly fetchImpl: typeof fetch;
  private readonly requestTimeoutMs: number;
  private readonly healthCheckIntervalMs: number;
  private readonly health = new Map<string, LlmProviderHealth>();

  constructor(private readonly options: HttpLlmServiceOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 60_000;
    this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? 60_000;
  }

  async chat(options: LlmChatOptions): Promise<LlmChatResult> {
    const { provider } = options;
    const endpoint = this.endpoint(provider);
    const apiKey = this.apiKey(provider);

    logInfo('HTTP LLM: chat call', { provider, messages: options.messages.length });
    const response = await this.fetchImpl(`${endpoint.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: options.modelId ?? endpoint.defaultModel,
        messages: options.messages,
        max_tokens: options.maxTokens ?? 1000,
        temperature: options.temperature ?? 0.3,
        stream: false,
      }),
      signal: this.requestSignal(options.signal),
    });

    if (!response.ok) {
      const body = await response.text().catch((error: unknown) => getErrorMessage(error));
      logWarning('HTTP LLM: chat call failed', { provider, status: response.status });
      throw new Error(`llm_execution_failed: ${provider} returned ${response.status}: ${body.slice(0, 200)}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`llm_invalid_response: ${provider} returned an unexpected completion shape`);
    }
    return { provider, content: parsed.data.choices[0]?.message.content ?? '' };
  }

  async checkHealth(provider: string, forceCheck = false): Promise<LlmProviderHealth> {
    const now = Date.now();
    const cached = this.health.get(provider);
    if (!forceCheck && cached && now - cached.lastCheck < this.healthCheckIntervalMs) {
      return cached;
    }

    const result = await this.probe(provider, now);
    this.health.set(provider, result);
    return result;
  }

  private async probe(provider: string, now: number): Promise<LlmProviderHealth> {
    if (!isHttpProvider(provider)) {
      return { provider, available: false, authenticated: false, lastCheck: now, error: 'Unknown provider' };
    }
    const apiKey = this.options.apiKeys[provider]?.trim();
    if (!apiKey) {
      return { provider, available: true, authenticated: false, lastCheck: now, error: 'API key not configured' };
    }
    try {
      const response = await this.fetchImpl(`${this.endpoint(provider).baseUrl}/models`, {
        headers: { Authorization: `Bearer ${apiKey}` },
        signal: this.requestSignal(),
      });
      if (response.status === 401 || response.status === 403) {
        return { provider, available: true, authenticated: false, lastCheck: now, error: `HTTP ${response.status}` };
      }
      if (!response.ok) {
        return { provider, available: false, authenticated: false, lastCheck: now, error: `HTTP ${response.status}` };
      }
      return { provider, available: true, authenticated: true, lastCheck: now };
    } catch (error) {
      return { provider, available: false, authenticated: false, lastCheck: now, error: getErrorMessage(error) };
    }
  }

  private endpoint(provider: string): ProviderEndpoint {
    if (!isHttpProvider(provider)) {
      throw new Error(`llm_provider_unsupported: ${provider}`);
    }
    return this.options.endpoints?.[provider] ?? PROVIDER_ENDPOINTS[provider];
  }

  private apiKey(provider: string): string {
    const key = this.options.apiKeys[provider]?.trim();
    if (!key) {
      throw new Error(`llm_provider_unauthenticated: no API key for ${provider}`);
    }
    return key;
  }

  private requestSignal(external?: AbortSignal): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (external) signals.push(external);
    if (this.requestTimeoutMs > 0) signals.push(AbortSignal.timeout(this.requestTimeoutMs));
    if (signals.length === 0) return undefined;
    return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
  }
}

export function createHttpLlmService(options: HttpLlmServiceOptions): LlmServiceAdapter {
  return new HttpLlmService(options);
}
