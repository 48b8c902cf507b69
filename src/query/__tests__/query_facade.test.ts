import { describe, expect, it } from 'vitest';
import { ScriptedBoundary, sampleRecord, type ScriptedBoundaryOptions } from '../../__tests__/helpers/index.js';
import type { ErrorInfo } from '../../core/errors.js';
import type { FacadeOptionsInput } from '../../config/schema.js';
import { AdvisorEventBus, type AdvisorEvent } from '../../events.js';
import type { FallbackResponseGenerator } from '../../fallback/index.js';
import { SystemLifecycle } from '../../lifecycle/system_lifecycle.js';
import type { NativeArgs, NativeOperation } from '../../native/types.js';
import type { QueryResponse, StreamHandlers } from '../../types.js';
import { QueryFacade, conversationKey } from '../query_facade.js';

interface Setup {
  boundary: ScriptedBoundary;
  lifecycle: SystemLifecycle;
  facade: QueryFacade;
  seen: AdvisorEvent[];
}

function setup(
  script: ScriptedBoundaryOptions = {},
  options: FacadeOptionsInput = { fallbackChunkDelayMs: 0 },
  fallback?: FallbackResponseGenerator | null
): Setup {
  const boundary = new ScriptedBoundary(script);
  const events = new AdvisorEventBus();
  const seen: AdvisorEvent[] = [];
  events.on('*', (event) => {
    seen.push(event);
  });
  const lifecycle = new SystemLifecycle({ loader: () => boundary, events });
  const facade = new QueryFacade({ lifecycle, events, options, ...(fallback === undefined ? {} : { fallback }) });
  return { boundary, lifecycle, facade, seen };
}

async function ready(script: ScriptedBoundaryOptions = {}): Promise<Setup> {
  const context = setup(script);
  await context.lifecycle.initialize({});
  return context;
}

function recorder() {
  const chunks: string[] = [];
  const completed: QueryResponse[] = [];
  const errors: ErrorInfo[] = [];
  const handlers: StreamHandlers = {
    onChunk: (text) => chunks.push(text),
    onComplete: (response) => completed.push(response),
    onError: (error) => errors.push(error),
  };
  return { chunks, completed, errors, handlers };
}

describe('conversationKey', () => {
  it('uses the explicit conversation or derives one from kind and user', () => {
    expect(conversationKey({ kind: 'chat_message', conversationId: 'c-7', userId: 'alice' })).toBe('c-7');
    expect(conversationKey({ kind: 'chat_message', userId: 'alice' })).toBe('chat_message:alice');
    expect(conversationKey({ kind: 'text' })).toBe('text:anonymous');
  });
});

describe('QueryFacade.analyze', () => {
  it('routes requests to the native operation for their kind', async () => {
    const invoked: Array<[NativeOperation, NativeArgs]> = [];
    const { facade } = await ready({
      invoke: (operation, args) => {
        invoked.push([operation, args]);
        return sampleRecord({ response: `answer to ${operation}` });
      },
    });

    const result = await facade.analyze({ kind: 'token', payload: ' SOL ', language: 'en', userId: 'alice' });
    await facade.analyze({ kind: 'contract', payload: '0xabc', language: 'en' });

    expect(result.ok && result.value.text).toBe('answer to analyze_token');
    expect(invoked).toEqual([
      ['analyze_token', { payload: 'SOL', userId: 'alice', language: 'en' }],
      ['analyze_contract', { payload: '0xabc', language: 'en' }],
    ]);
  });

  it('rejects invalid requests without touching the backend', async () => {
    const { facade, boundary } = await ready();

    const result = await facade.analyze({ kind: 'text', payload: '   ', language: 'en' });

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'INVALID_QUERY',
        message: 'Invalid query (payload): payload must not be empty',
        retryable: false,
        details: { field: 'payload' },
      },
    });
    expect(boundary.calls.invoke).toBe(0);
  });

  it('answers from the fallback before initialization', async () => {
    const { facade, seen } = setup();

    const result = await facade.analyze({ kind: 'text', payload: 'What is riba?', language: 'en' });

    expect(result.ok && result.value.sources).toEqual(['fallback']);
    expect(seen.map((event) => event.type)).toEqual(['fallback_used']);
    expect(seen[0]?.data).toEqual({ kind: 'text', streaming: false, lifecycle: 'not_initialized' });
  });

  it('fails with NOT_INITIALIZED when the fallback is disabled', async () => {
    const { facade } = setup({}, {}, null);

    const result = await facade.analyze({ kind: 'token', payload: 'BTC', language: 'en' });

    expect(!result.ok && result.error).toEqual({
      code: 'NOT_INITIALIZED',
      message: 'Advisor system is not_initialized and no fallback is configured',
      retryable: false,
    });
  });

  it('cancels a native call through the abort signal', async () => {
    const { facade, boundary } = await ready({ invoke: () => 'never' });
    const controller = new AbortController();

    const pending = facade.analyze({ kind: 'text', payload: 'What is riba?', language: 'en' }, { signal: controller.signal });
    controller.abort('navigated away');
    const result = await pending;

    expect(!result.ok && result.error.code).toBe('CALL_CANCELLED');
    expect(boundary.liveCount).toBe(0);
  });
});

describe('QueryFacade.analyzeStream', () => {
  it('streams cumulative text from the native side', async () => {
    const { facade, boundary } = await ready();
    const { chunks, completed, errors, handlers } = recorder();

    const ticket = facade.analyzeStream({ kind: 'chat_message', payload: 'What is riba?', language: 'en' }, handlers);
    const stream = boundary.streams[0];
    if (!stream) throw new Error('stream was not registered');
    stream.callback.onChunk({ chunkIndex: 0, content: 'Riba ' });
    stream.callback.onChunk({ chunkIndex: 1, content: 'is ' });
    stream.callback.onComplete(sampleRecord({ response: 'Riba is prohibited.' }));
    boundary.finishStream(stream);
    await ticket.done;

    expect(ticket.mode).toBe('native');
    expect(stream.operation).toBe('chat');
    expect(chunks).toEqual(['Riba ', 'Riba is ']);
    expect(completed.map((response) => response.text)).toEqual(['Riba is prohibited.']);
    expect(errors).toEqual([]);
    expect(facade.activeStreamCount).toBe(0);
  });

  it('ends the stream on a sequence gap and cancels the native call', async () => {
    const { facade, boundary } = await ready();
    const { chunks, completed, errors, handlers } = recorder();

    const ticket = facade.analyzeStream({ kind: 'text', payload: 'What is riba?', language: 'en' }, handlers);
    const stream = boundary.streams[0];
    if (!stream) throw new Error('stream was not registered');
    stream.callback.onChunk({ chunkIndex: 0, content: 'a' });
    stream.callback.onChunk({ chunkIndex: 2, content: 'c' });
    await ticket.done;

    expect(chunks).toEqual(['a']);
    expect(completed).toEqual([]);
    expect(errors.map((error) => error.code)).toEqual(['PROTOCOL_VIOLATION']);
    expect(boundary.trace).toContain(`cancel:${stream.future.id}`);
  });

  it('streams the fallback answer as growing prefixes and completes once', async () => {
    const { facade, seen } = setup();
    const { chunks, completed, errors, handlers } = recorder();

    const ticket = facade.analyzeStream({ kind: 'token', payload: 'BTC', language: 'en' }, handlers);
    await ticket.done;

    expect(ticket.mode).toBe('fallback');
    expect(chunks.length).toBeGreaterThanOrEqual(1);
    for (const [index, text] of chunks.entries()) {
      expect(text.length).toBe(Math.min((index + 1) * 20, chunks[chunks.length - 1]?.length ?? 0));
    }
    expect(completed).toHaveLength(1);
    expect(completed[0]?.sources).toEqual(['fallback']);
    expect(chunks[chunks.length - 1]).toBe(completed[0]?.text);
    expect(errors).toEqual([]);
    expect(seen.find((event) => event.type === 'fallback_used')?.data).toEqual({
      kind: 'token',
      streaming: true,
      lifecycle: 'not_initialized',
    });
  });

  it('streams one empty chunk before completing an empty fallback answer', async () => {
    const empty: FallbackResponseGenerator = {
      generate: () => ({
        id: 'fallback_empty',
        text: '',
        confidence: 0.5,
        sources: ['fallback'],
        followUps: [],
        createdAt: 0,
      }),
    };
    const { facade } = setup({}, { fallbackChunkDelayMs: 0 }, empty);
    const order: string[] = [];

    const ticket = facade.analyzeStream(
      { kind: 'text', payload: 'anything', language: 'en' },
      {
        onChunk: (text) => order.push(`chunk:${text}`),
        onComplete: (response) => order.push(`complete:${response.id}`),
        onError: (error) => order.push(`error:${error.code}`),
      }
    );
    await ticket.done;

    expect(order).toEqual(['chunk:', 'complete:fallback_empty']);
  });

  it('keeps the running stream when a request on its conversation is invalid', async () => {
    const { facade, boundary, seen } = await ready();
    const running = recorder();
    const rejected = recorder();
    const request = { kind: 'chat_message' as const, payload: 'What is riba?', language: 'en', userId: 'alice' };

    const runningTicket = facade.analyzeStream(request, running.handlers);
    const rejectedTicket = facade.analyzeStream({ ...request, payload: '   ' }, rejected.handlers);
    await rejectedTicket.done;

    expect(rejected.errors.map((error) => error.code)).toEqual(['INVALID_QUERY']);
    expect(facade.activeStreamCount).toBe(1);
    expect(seen.some((event) => event.type === 'stream_superseded')).toBe(false);

    const [stream] = boundary.streams;
    if (!stream) throw new Error('stream was not registered');
    stream.callback.onChunk({ chunkIndex: 0, content: 'Riba ' });
    stream.callback.onComplete(sampleRecord({ response: 'Riba is interest.' }));
    await runningTicket.done;

    expect(running.chunks).toEqual(['Riba ']);
    expect(running.completed.map((response) => response.text)).toEqual(['Riba is interest.']);
    expect(boundary.streams).toHaveLength(1);
  });

  it('drops a superseded stream silently', async () => {
    const { facade, boundary, seen } = await ready();
    const first = recorder();
    const second = recorder();
    const request = { kind: 'chat_message' as const, payload: 'What is riba?', language: 'en', userId: 'alice' };

    const firstTicket = facade.analyzeStream(request, first.handlers);
    const secondTicket = facade.analyzeStream({ ...request, payload: 'And gharar?' }, second.handlers);
    await firstTicket.done;
    const [firstStream, secondStream] = boundary.streams;
    if (!firstStream || !secondStream) throw new Error('streams were not registered');
    firstStream.callback.onChunk({ chunkIndex: 0, content: 'late' });
    secondStream.callback.onChunk({ chunkIndex: 0, content: 'Gharar ' });
    secondStream.callback.onComplete(sampleRecord({ response: 'Gharar is excessive uncertainty.' }));
    await secondTicket.done;

    expect(first.chunks).toEqual([]);
    expect(first.completed).toEqual([]);
    expect(first.errors).toEqual([]);
    expect(second.chunks).toEqual(['Gharar ']);
    expect(second.completed.map((response) => response.text)).toEqual(['Gharar is excessive uncertainty.']);
    expect(boundary.trace).toContain(`cancel:${firstStream.future.id}`);
    expect(seen.find((event) => event.type === 'stream_superseded')?.data).toEqual({
      conversationId: 'chat_message:alice',
      supersededStreamId: firstTicket.streamId,
    });
  });

  it('keeps streams on different conversations independent', async () => {
    const { facade, lifecycle } = await ready();
    const { errors, handlers } = recorder();

    const alice = facade.analyzeStream({ kind: 'chat_message', payload: 'a', language: 'en', userId: 'alice' }, handlers);
    const bob = facade.analyzeStream({ kind: 'chat_message', payload: 'b', language: 'en', userId: 'bob' }, handlers);

    expect(facade.activeStreamCount).toBe(2);
    lifecycle.teardown();
    await Promise.all([alice.done, bob.done]);
    expect(errors.map((error) => error.message)).toEqual(['Native call chat torn down', 'Native call chat torn down']);
  });

  it('ends a cancelled native stream with CALL_CANCELLED', async () => {
    const { facade } = await ready();
    const { completed, errors, handlers } = recorder();

    const ticket = facade.analyzeStream({ kind: 'chat_message', payload: 'salam', language: 'en' }, handlers);
    ticket.cancel('user cancelled');
    await ticket.done;

    expect(completed).toEqual([]);
    expect(errors.map((error) => error.message)).toEqual(['Native call chat user cancelled']);
  });

  it('ends a cancelled fallback stream with CALL_CANCELLED', async () => {
    const { facade } = setup({}, { fallbackChunkDelayMs: 50 });
    const { completed, errors, handlers } = recorder();

    const ticket = facade.analyzeStream({ kind: 'token', payload: 'BTC', language: 'en' }, handlers);
    ticket.cancel();
    await ticket.done;

    expect(completed).toEqual([]);
    expect(errors.map((error) => [error.code, error.message])).toEqual([
      ['CALL_CANCELLED', 'Native call fallback_stream cancelled'],
    ]);
  });

  it('reports an invalid request through onError', async () => {
    const { facade } = await ready();
    const { chunks, errors, handlers } = recorder();

    const ticket = facade.analyzeStream({ kind: 'audio', payload: 'clip.wav', language: 'en' }, handlers);
    expect(errors).toEqual([]);
    await ticket.done;

    expect(chunks).toEqual([]);
    expect(errors.map((error) => error.message)).toEqual(['Invalid query (payload): audio queries carry raw bytes']);
    expect(facade.activeStreamCount).toBe(0);
  });
});

describe('QueryFacade.describeBackend', () => {
  it('reports the fallback until the native side is ready', async () => {
    const { facade, lifecycle } = setup();

    expect(facade.describeBackend()).toEqual({
      mode: 'fallback',
      lifecycle: 'not_initialized',
      agent: 'Offline Fallback',
      usingRealAi: false,
    });

    await lifecycle.initialize({});

    expect(facade.describeBackend()).toEqual({
      mode: 'native',
      lifecycle: 'ready',
      agent: 'Scripted Agent',
      usingRealAi: false,
    });
  });
});
