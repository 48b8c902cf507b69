/**
 * @fileoverview Advisory agents behind the engine.
 *
 * The mock agent answers from fixed templates and needs no network. The LLM
 * agent prompts a chat completion provider through the registered
 * {@link LlmServiceAdapter}.
 */

import type { LlmChatMessage, LlmServiceAdapter } from '../adapters/llm_service.js';
import type { ProviderName } from '../config/schema.js';
import { createLogger } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import { EngineError } from './engine_error.js';

const log = createLogger('AdvisoryAgent');

export interface AgentContext {
  language: string;
  userId?: string;
  signal?: AbortSignal;
}

export interface AgentAnswer {
  text: string;
  confidence: number;
  sources: string[];
  followUps: string[];
}

export interface AdvisoryAgent {
  readonly name: string;
  readonly usingRealAi: boolean;
  analyzeToken(symbol: string, context: AgentContext): Promise<AgentAnswer>;
  analyzeContract(address: string, context: AgentContext): Promise<AgentAnswer>;
  answer(question: string, context: AgentContext): Promise<AgentAnswer>;
  chat(message: string, context: AgentContext): Promise<AgentAnswer>;
}

// ============================================================================
// MOCK AGENT
// ============================================================================

export class MockAdvisoryAgent implements AdvisoryAgent {
  readonly name = 'Mock Agent';
  readonly usingRealAi = false;

  async analyzeToken(symbol: string): Promise<AgentAnswer> {
    return {
      text:
        `**${symbol} Analysis**\n\n` +
        '**Ruling: Haram (Prohibited)**\n\n' +
        `**Reasoning:** Excessive volatility and speculation make ${symbol} problematic under Islamic ` +
        'finance principles. Without intrinsic value, trading it carries gharar.\n\n' +
        '**Recommendation:** Consult qualified Islamic scholars for personalized guidance.',
      confidence: 0.8,
      sources: ['Islamic Finance Analysis', 'Mock Response'],
      followUps: [`Is staking ${symbol} permissible?`, 'Which tokens are considered halal?'],
    };
  }

  async analyzeContract(address: string): Promise<AgentAnswer> {
    return {
      text:
        `**Contract ${address}**\n\n` +
        'Simulated review: no interest-bearing functions were found, but ownership and upgrade ' +
        'controls should be checked for gharar before use.',
      confidence: 0.7,
      sources: ['Islamic Finance Analysis', 'Mock Response'],
      followUps: ['What is gharar in smart contracts?'],
    };
  }

  async answer(): Promise<AgentAnswer> {
    return {
      text:
        '**Mock Response**\n\n' +
        'This is a simulated answer for testing. A configured AI provider would give Islamic finance ' +
        'guidance for your question. Please consult qualified scholars for religious rulings.',
      confidence: 0.7,
      sources: ['Islamic Finance Knowledge', 'Mock Response'],
      followUps: [],
    };
  }

  async chat(message: string): Promise<AgentAnswer> {
    return {
      text: `Thank you for your question: '${message}'. I will analyze this based on Islamic principles.`,
      confidence: 0.8,
      sources: ['Islamic Chat Session'],
      followUps: [],
    };
  }
}

// ============================================================================
// LLM AGENT
// ============================================================================

const SYSTEM_PROMPT =
  'You are an expert in Islamic finance and Fiqh. Analyze cryptocurrencies and financial instruments ' +
  'against Sharia principles: no riba (interest), no gharar (excessive uncertainty), no maysir ' +
  '(gambling), and the objectives of Islamic law. Give a clear ruling with reasoning, state your ' +
  'confidence, and recommend consulting qualified scholars for important decisions.';

const FOLLOW_UP_PROMPT =
  'Based on this Islamic finance analysis, write 3 follow-up questions that would help the user ' +
  'understand the topic better. Reply with the questions only, one per line, without numbering.';

const PROVIDER_LABELS: Record<Exclude<ProviderName, 'mock'>, string> = {
  groq: 'Groq',
  openai: 'OpenAI',
  grok: 'Grok',
};

export interface LlmAdvisoryAgentOptions {
  provider: Exclude<ProviderName, 'mock'>;
  llm: LlmServiceAdapter;
  modelId?: string;
}

/** Lines of a follow-up reply, without list markers, at most three. */
export function parseFollowUps(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim())
    .filter((line) => line.length > 0)
    .slice(0, 3);
}

export class LlmAdvisoryAgent implements AdvisoryAgent {
  readonly usingRealAi = true;
  readonly name: string;
  private readonly source: string;

  constructor(private readonly options: LlmAdvisoryAgentOptions) {
    const label = PROVIDER_LABELS[options.provider];
    this.name = `${label} Agent`;
    this.source = `${label} AI`;
  }

  analyzeToken(symbol: string, context: AgentContext): Promise<AgentAnswer> {
    return this.ask(
      `Analyze the cryptocurrency token ${symbol} for Islamic (Sharia) compliance. ` +
        'Provide a clear halal/haram ruling with reasoning.',
      context,
      'Islamic Finance Analysis'
    );
  }

  analyzeContract(address: string, context: AgentContext): Promise<AgentAnswer> {
    return this.ask(
      `Review the smart contract at ${address} for riba, gharar and maysir, and state whether ` +
        'interacting with it is permissible.',
      context,
      'Islamic Finance Analysis'
    );
  }

  answer(question: string, context: AgentContext): Promise<AgentAnswer> {
    return this.ask(question, context, 'Islamic Finance Knowledge');
  }

  chat(message: string, context: AgentContext): Promise<AgentAnswer> {
    return this.ask(message, context, 'Islamic Chat Session');
  }

  private async ask(prompt: string, context: AgentContext, primarySource: string): Promise<AgentAnswer> {
    const messages: LlmChatMessage[] = [
      { role: 'system', content: `${SYSTEM_PROMPT} Answer in language "${context.language}".` },
      { role: 'user', content: prompt },
    ];
    let content: string;
    try {
      const reply = await this.options.llm.chat({
        provider: this.options.provider,
        modelId: this.options.modelId,
        messages,
        temperature: 0.3,
        maxTokens: 1000,
        signal: context.signal,
      });
      content = reply.content;
    } catch (error) {
      throw new EngineError('ai_error', getErrorMessage(error));
    }
    return {
      text: content,
      confidence: 0.9,
      sources: [primarySource, this.source],
      followUps: await this.followUps(content, context),
    };
  }

  private async followUps(analysis: string, context: AgentContext): Promise<string[]> {
    try {
      const reply = await this.options.llm.chat({
        provider: this.options.provider,
        modelId: this.options.modelId,
        messages: [
          { role: 'system', content: 'You are an Islamic finance expert writing follow-up questions.' },
          { role: 'user', content: `${FOLLOW_UP_PROMPT}\n\n${analysis}` },
        ],
        temperature: 0.5,
        maxTokens: 200,
        signal: context.signal,
      });
      return parseFollowUps(reply.content);
    } catch (error) {
      log.warn('follow-up generation failed', { error: getErrorMessage(error) });
      return [];
    }
  }
}
