import type {
  LlmChatOptions,
  LlmChatResult,
  LlmProviderHealth,
  LlmServiceAdapter,
} from '../../adapters/llm_service.js';

export interface FakeLlmCall {
  provider: string;
  system: string;
  user: string;
}

/**
 * LLM adapter answering from a queue of replies. An Error in the queue is
 * thrown by the matching chat call; an empty queue answers 'ok'.
 */
export class FakeLlmService implements LlmServiceAdapter {
  readonly calls: FakeLlmCall[] = [];
  healthChecks = 0;

  constructor(
    private readonly replies: Array<string | Error> = [],
    private readonly health: Partial<LlmProviderHealth> = {},
  ) {}

  async chat(options: LlmChatOptions): Promise<LlmChatResult> {
    this.calls.push({
      provider: options.provider,
      system: options.messages.find((message) => message.role === 'system')?.content ?? '',
      user: options.messages.find((message) => message.role === 'user')?.content ?? '',
    });
    const reply = this.replies.shift() ?? 'ok';
    if (reply instanceof Error) throw reply;
    return { provider: options.provider, content: reply };
  }

  async checkHealth(provider: string): Promise<LlmProviderHealth> {
    this.healthChecks++;
    return { provider, available: true, authenticated: true, lastCheck: 0, ...this.health };
  }
}
