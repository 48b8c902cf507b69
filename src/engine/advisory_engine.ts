/**
 * @fileoverview Advisory engine
 *
 * The system the native boundary constructs: an agent (mock or LLM), the
 * analysis history and the chain connectivity descriptor. Operations return
 * native answer records (timestamps in seconds).
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { createHttpLlmService } from '../adapters/http_llm_service.js';
import { resolveLlmServiceAdapter, type LlmServiceAdapter } from '../adapters/llm_service.js';
import type { AdvisorConfig } from '../config/schema.js';
import { normalizeSymbol } from '../fallback/reference_tokens.js';
import type { NativeArgs, NativeOperation, NativeQueryRecord, NativeSystemDescription } from '../native/types.js';
import { createLogger } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  LlmAdvisoryAgent,
  MockAdvisoryAgent,
  type AdvisoryAgent,
  type AgentAnswer,
  type AgentContext,
} from './agents.js';
import { resolveChainNetwork, type ChainNetwork } from './chain.js';
import { EngineError } from './engine_error.js';
import { AnalysisHistoryStore, summarize } from './history_store.js';
import { transcribeAudio } from './transcription.js';

const log = createLogger('AdvisoryEngine');

export interface AdvisoryEngineOptions {
  /** Overrides the registered adapter and the HTTP default. */
  llm?: LlmServiceAdapter;
  fetch?: typeof fetch;
  now?: () => number;
  /** Skip the provider health probe at startup. */
  skipHealthCheck?: boolean;
}

function requireText(args: NativeArgs, operation: NativeOperation): string {
  if (typeof args.payload !== 'string' || args.payload.trim().length === 0) {
    throw new EngineError('invalid_query', `${operation} expects a non-empty text payload`);
  }
  return args.payload.trim();
}

function requireBytes(args: NativeArgs): Uint8Array {
  if (typeof args.payload === 'string') {
    throw new EngineError('invalid_query', 'analyze_audio expects raw audio bytes');
  }
  return args.payload;
}

export class AdvisoryEngine {
  private closed = false;

  private constructor(
    private readonly agent: AdvisoryAgent,
    private readonly history: AnalysisHistoryStore,
    private readonly network: ChainNetwork | null,
    private readonly vectorSearch: boolean,
    private readonly now: () => number,
  ) {}

  /**
   * Build the engine for `config`. A keyed provider whose health probe fails
   * leaves the engine on the mock agent.
   */
  static async open(config: AdvisorConfig, options: AdvisoryEngineOptions = {}, signal?: AbortSignal): Promise<AdvisoryEngine> {
    const agent = await AdvisoryEngine.selectAgent(config, options, signal);
    if (signal?.aborted) {
      throw new EngineError('cancelled', 'engine construction cancelled');
    }
    const history = AnalysisHistoryStore.open(config.storagePath);
    const network = resolveChainNetwork(config);
    log.info('engine ready', {
      agent: agent.name,
      storage: config.storagePath ? 'file' : 'memory',
      network: network?.name ?? null,
    });
    return new AdvisoryEngine(agent, history, network, Boolean(config.vectorStoreUrl), options.now ?? Date.now);
  }

  private static async selectAgent(
    config: AdvisorConfig,
    options: AdvisoryEngineOptions,
    signal?: AbortSignal
  ): Promise<AdvisoryAgent> {
    const provider = config.preferredProvider;
    if (provider === 'mock') return new MockAdvisoryAgent();

    const llm = resolveLlmServiceAdapter(options.llm, () => createHttpLlmService({ apiKeys: config.apiKeys, fetch: options.fetch }));
    if (!options.skipHealthCheck) {
      let error: string | null = null;
      try {
        const health = await llm.checkHealth(provider, true);
        if (!health.available || !health.authenticated) error = health.error ?? 'unavailable';
      } catch (probeError) {
        error = getErrorMessage(probeError);
      }
      if (signal?.aborted) {
        throw new EngineError('cancelled', 'engine construction cancelled');
      }
      if (error !== null) {
        log.warn('provider unavailable, using mock agent', { provider, error });
        return new MockAdvisoryAgent();
      }
    }
    return new LlmAdvisoryAgent({ provider, llm, modelId: config.modelName });
  }

  get historyStore(): AnalysisHistoryStore {
    return this.history;
  }

  describe(): NativeSystemDescription {
    return {
      agent: this.agent.name,
      usingRealAi: this.agent.usingRealAi,
      ...(this.network ? { network: this.network.name } : {}),
      storage: this.history.isMemory ? 'memory' : 'file',
      vectorSearch: this.vectorSearch,
    };
  }

  async execute(operation: NativeOperation, args: NativeArgs, signal?: AbortSignal): Promise<NativeQueryRecord> {
    if (this.closed) {
      throw new EngineError('system_destroyed', 'advisory engine has been destroyed');
    }
    const context: AgentContext = { language: args.language, userId: args.userId, signal };

    switch (operation) {
      case 'analyze_token': {
        const symbol = normalizeSymbol(requireText(args, operation));
        const answer = await this.agent.analyzeToken(symbol, context);
        return this.recordAnalysis(operation, symbol, `token_${symbol}`, answer, args.userId);
      }
      case 'analyze_contract': {
        const address = requireText(args, operation);
        const answer = await this.agent.analyzeContract(address, context);
        return this.recordAnalysis(operation, address, `contract_${address}`, answer, args.userId);
      }
      case 'query':
        return this.toRecord('query', await this.agent.answer(requireText(args, operation), context));
      case 'analyze_audio': {
        const transcription = transcribeAudio(requireBytes(args));
        log.debug('audio transcribed', { transcription });
        const answer = await this.agent.answer(transcription, context);
        return this.toRecord('audio', { ...answer, text: `> ${transcription}\n\n${answer.text}` });
      }
      case 'chat': {
        const answer = await this.agent.chat(requireText(args, operation), context);
        return this.toRecord(`chat_${args.userId ?? 'anonymous'}`, answer);
      }
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.history.close();
    } catch (error) {
      log.warn('history close failed', { error: getErrorMessage(error) });
    }
  }

  private toRecord(idPrefix: string, answer: AgentAnswer, analysisId?: string): NativeQueryRecord {
    const timestamp = Math.floor(this.now() / 1000);
    return {
      queryId: `${idPrefix}_${timestamp}`,
      response: answer.text,
      confidence: answer.confidence,
      sources: answer.sources,
      followUps: answer.followUps,
      timestamp,
      ...(analysisId ? { analysisId } : {}),
    };
  }

  private recordAnalysis(
    operation: NativeOperation,
    subject: string,
    idPrefix: string,
    answer: AgentAnswer,
    userId: string | undefined
  ): NativeQueryRecord {
    const record = this.toRecord(idPrefix, answer, randomUUID());
    if (record.analysisId) {
      this.history.record({
        analysisId: record.analysisId,
        queryId: record.queryId,
        userId: userId ?? null,
        operation,
        subject,
        confidence: record.confidence,
        summary: summarize(record.response),
        analyzedAt: record.timestamp,
      });
    }
    return record;
  }
}
