/**
 * @fileoverview Query facade
 *
 * The single surface presentation code talks to. Requests go to the native
 * subsystem while the lifecycle is ready and to the fallback generator
 * otherwise, so an unavailable or degraded backend still answers.
 *
 * Streams are tracked per logical conversation: starting a stream supersedes
 * the one still running on the same conversation, whose callbacks are then
 * dropped and whose native call is cancelled.
 *
 * @packageDocumentation
 */

import { Errors, type ErrorInfo } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { FacadeOptionsSchema, QueryRequestSchema, type FacadeOptions, type FacadeOptionsInput } from '../config/schema.js';
import {
  createFallbackUsedEvent,
  createStreamSupersededEvent,
  globalEventBus,
  type AdvisorEventBus,
} from '../events.js';
import { CannedFallbackGenerator, type FallbackResponseGenerator } from '../fallback/canned_fallback.js';
import type { NativeChannel, SystemLifecycle } from '../lifecycle/system_lifecycle.js';
import type { NativeArgs, NativeOperation } from '../native/types.js';
import { ChunkAggregator } from '../streaming/chunk_aggregator.js';
import { createLogger } from '../telemetry/logger.js';
import type { AggregationResult, BackendInfo, QueryKind, QueryRequest, QueryResponse, StreamHandlers } from '../types.js';
import { AbortedError, delay } from '../utils/async.js';
import { chunkText } from '../utils/chunk_text.js';
import { getErrorMessage } from '../utils/errors.js';
import { StreamSession } from './stream_session.js';

const log = createLogger('QueryFacade');

export const OPERATION_FOR_KIND: Readonly<Record<QueryKind, NativeOperation>> = {
  token: 'analyze_token',
  text: 'query',
  contract: 'analyze_contract',
  audio: 'analyze_audio',
  chat_message: 'chat',
};

export const FALLBACK_AGENT_NAME = 'Offline Fallback';

const FALLBACK_STREAM_OPERATION = 'fallback_stream';

export interface QueryFacadeDeps {
  lifecycle: SystemLifecycle;
  /** `null` disables the fallback: requests made while not ready fail with NOT_INITIALIZED. */
  fallback?: FallbackResponseGenerator | null;
  events?: AdvisorEventBus;
  options?: FacadeOptionsInput;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

export interface StreamTicket {
  readonly streamId: number;
  readonly conversationId: string;
  readonly mode: BackendInfo['mode'];
  /** Ends the stream with CALL_CANCELLED unless it already ended. */
  cancel(reason?: string): void;
  /** Resolves after the terminal callback, or as soon as the stream is superseded. */
  readonly done: Promise<void>;
}

/** The conversation a request streams on when it names none. */
export function conversationKey(request: Pick<QueryRequest, 'kind' | 'userId' | 'conversationId'>): string {
  return request.conversationId ?? `${request.kind}:${request.userId ?? 'anonymous'}`;
}

function toNativeArgs(request: QueryRequest): NativeArgs {
  return request.userId
    ? { payload: request.payload, userId: request.userId, language: request.language }
    : { payload: request.payload, language: request.language };
}

export class QueryFacade {
  private readonly lifecycle: SystemLifecycle;
  private readonly fallback: FallbackResponseGenerator | null;
  private readonly events: AdvisorEventBus;
  private readonly options: FacadeOptions;
  private readonly conversations = new Map<string, StreamSession>();
  private nextStreamId = 1;

  constructor(deps: QueryFacadeDeps) {
    this.lifecycle = deps.lifecycle;
    this.fallback = deps.fallback === undefined ? new CannedFallbackGenerator() : deps.fallback;
    this.events = deps.events ?? globalEventBus;
    this.options = FacadeOptionsSchema.parse(deps.options ?? {});
  }

  /** Streams still running, one per conversation. */
  get activeStreamCount(): number {
    return this.conversations.size;
  }

  async analyze(request: QueryRequest, options: AnalyzeOptions = {}): Promise<Result<QueryResponse, ErrorInfo>> {
    const validated = this.validate(request);
    if (!validated.ok) return validated;

    const channel = this.lifecycle.channel();
    if (!channel) return this.fallbackResponse(validated.value, false);

    return channel.callOnce(OPERATION_FOR_KIND[validated.value.kind], toNativeArgs(validated.value), {
      timeoutMs: this.options.callTimeoutMs,
      signal: options.signal,
    });
  }

  analyzeStream(request: QueryRequest, handlers: StreamHandlers, options: AnalyzeOptions = {}): StreamTicket {
    const conversationId = conversationKey(request);
    const validated = this.validate(request);
    if (!validated.ok) {
      // Rejected before it starts: the conversation's current stream keeps running.
      const session = new StreamSession(this.nextStreamId++, conversationId, handlers, () => {});
      const error = validated.error;
      queueMicrotask(() => session.fail(error));
      return this.ticket(session, 'fallback');
    }

    this.supersede(conversationId);
    const session = new StreamSession(this.nextStreamId++, conversationId, handlers, (ended) => {
      if (this.conversations.get(conversationId) === ended) this.conversations.delete(conversationId);
    });
    this.conversations.set(conversationId, session);

    const channel = this.lifecycle.channel();
    if (channel) {
      this.streamNative(channel, validated.value, session, options.signal);
      return this.ticket(session, 'native');
    }
    this.streamFallback(validated.value, session, options.signal);
    return this.ticket(session, 'fallback');
  }

  describeBackend(): BackendInfo {
    const { state, system } = this.lifecycle.describe();
    if (state.status === 'ready') {
      return {
        mode: 'native',
        lifecycle: state.status,
        agent: system?.agent ?? 'Native Agent',
        usingRealAi: system?.usingRealAi ?? false,
        ...(system?.network ? { network: system.network } : {}),
      };
    }
    return { mode: 'fallback', lifecycle: state.status, agent: FALLBACK_AGENT_NAME, usingRealAi: false };
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private ticket(session: StreamSession, mode: BackendInfo['mode']): StreamTicket {
    return {
      streamId: session.id,
      conversationId: session.conversationId,
      mode,
      cancel: (reason) => session.cancel(reason),
      done: session.done,
    };
  }

  private validate(request: QueryRequest): Result<QueryRequest, ErrorInfo> {
    const parsed = QueryRequestSchema.safeParse(request);
    if (parsed.success) return Ok(parsed.data);
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'request';
    return Err(Errors.invalidQuery(field, issue?.message ?? 'invalid request').toInfo());
  }

  private fallbackResponse(request: QueryRequest, streaming: boolean): Result<QueryResponse, ErrorInfo> {
    const status = this.lifecycle.state.status;
    if (!this.fallback) {
      return Err(Errors.notInitialized(`Advisor system is ${status} and no fallback is configured`).toInfo());
    }
    this.events.emit(createFallbackUsedEvent(request.kind, streaming, status));
    log.debug('answering from fallback', { kind: request.kind, lifecycle: status });
    return Ok(this.fallback.generate(request));
  }

  private supersede(conversationId: string): void {
    const previous = this.conversations.get(conversationId);
    if (!previous) return;
    this.conversations.delete(conversationId);
    previous.drop();
    this.events.emit(createStreamSupersededEvent(conversationId, previous.id));
    log.debug('stream superseded', { conversationId, streamId: previous.id });
  }

  private streamNative(
    channel: NativeChannel,
    request: QueryRequest,
    session: StreamSession,
    signal: AbortSignal | undefined
  ): void {
    const aggregator = new ChunkAggregator();
    const operation = OPERATION_FOR_KIND[request.kind];
    const settle = (result: AggregationResult): void => {
      if (!result.isFinal) {
        session.chunk(result.accumulatedText);
      } else if ('response' in result) {
        session.complete(result.response);
      } else {
        session.fail(result.error);
      }
    };
    const report = (error: unknown): void => {
      log.error('stream aggregation failed', { operation, error: getErrorMessage(error) });
    };

    const subscription = channel.callStreaming(
      operation,
      toNativeArgs(request),
      {
        onChunk: (chunk) => {
          aggregator
            .feed(chunk)
            .then((result) => {
              settle(result);
              if (result.isFinal) subscription.cancel('protocol violation');
            })
            .catch(report);
        },
        onComplete: (response) => {
          aggregator.complete(response).then(settle).catch(report);
        },
        onError: (error) => {
          aggregator.fail(error).then(settle).catch(report);
        },
      },
      { timeoutMs: this.options.streamTimeoutMs, signal }
    );
    session.attach((reason) => subscription.cancel(reason));
  }

  private streamFallback(request: QueryRequest, session: StreamSession, signal: AbortSignal | undefined): void {
    const fallback = this.fallbackResponse(request, true);
    if (!fallback.ok) {
      const error = fallback.error;
      queueMicrotask(() => session.fail(error));
      return;
    }

    const controller = new AbortController();
    if (signal) {
      if (signal.aborted) controller.abort(signal.reason);
      else signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
    }
    session.attach((reason) => controller.abort(reason));

    void this.replay(fallback.value, session, controller.signal).catch((error: unknown) => {
      if (error instanceof AbortedError || controller.signal.aborted) {
        const reason = controller.signal.reason;
        session.fail(Errors.cancelled(FALLBACK_STREAM_OPERATION, typeof reason === 'string' ? reason : undefined).toInfo());
        return;
      }
      session.fail(Errors.native('internal', getErrorMessage(error), FALLBACK_STREAM_OPERATION).toInfo());
    });
  }

  /** Emit the canned text at the fallback cadence, then complete. */
  private async replay(response: QueryResponse, session: StreamSession, signal: AbortSignal): Promise<void> {
    const aggregator = new ChunkAggregator();
    const chunks = chunkText(response.text, this.options.fallbackChunkSize);
    // An empty answer still streams one (empty) chunk before completing.
    if (chunks.length === 0) chunks.push('');
    for (const [sequence, content] of chunks.entries()) {
      if (sequence > 0) await delay(this.options.fallbackChunkDelayMs, signal);
      if (signal.aborted) throw new AbortedError();
      if (!session.isActive) return;
      const snapshot = await aggregator.feed({ sequence, content });
      session.chunk(snapshot.accumulatedText);
    }
    await delay(this.options.fallbackChunkDelayMs, signal);
    const final = await aggregator.complete(response);
    if ('response' in final) session.complete(final.response);
  }
}
