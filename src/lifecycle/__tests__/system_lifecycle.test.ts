import { afterEach, describe, expect, it, vi } from 'vitest';
import { ScriptedBoundary, type ScriptedBoundaryOptions } from '../../__tests__/helpers/index.js';
import type { LifecycleOptionsInput } from '../../config/schema.js';
import { AdvisorEventBus } from '../../events.js';
import { QueryFacade } from '../../query/query_facade.js';
import { SystemLifecycle } from '../system_lifecycle.js';

function setup(script: ScriptedBoundaryOptions = {}, options: LifecycleOptionsInput = {}) {
  const boundary = new ScriptedBoundary(script);
  const events = new AdvisorEventBus();
  const transitions: string[] = [];
  events.on('lifecycle_state_changed', (event) => {
    if (event.type === 'lifecycle_state_changed') transitions.push(`${event.data.from}->${event.data.to}`);
  });
  const loader = vi.fn(() => boundary);
  const lifecycle = new SystemLifecycle({ loader, events, options });
  return { boundary, events, loader, lifecycle, transitions };
}

function settleTasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

afterEach(() => {
  vi.useRealTimers();
});

describe('SystemLifecycle.initialize', () => {
  it('reaches ready and exposes a channel', async () => {
    const { boundary, lifecycle, transitions } = setup();

    const state = await lifecycle.initialize({});

    expect(state).toEqual({ status: 'ready' });
    expect(lifecycle.isReady()).toBe(true);
    expect(lifecycle.channel()).not.toBeNull();
    expect(transitions).toEqual(['not_initialized->initializing', 'initializing->ready']);
    expect(boundary.liveCount).toBe(0);
  });

  it('constructs once for concurrent callers', async () => {
    const { boundary, loader, lifecycle } = setup();

    const states = await Promise.all([lifecycle.initialize({}), lifecycle.initialize({}), lifecycle.initialize({})]);

    expect(states.map((state) => state.status)).toEqual(['ready', 'ready', 'ready']);
    expect(boundary.calls.construct).toBe(1);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it('returns the settled state without constructing again', async () => {
    const { boundary, lifecycle } = setup();
    await lifecycle.initialize({});

    await lifecycle.initialize({});

    expect(boundary.calls.construct).toBe(1);
  });

  it('settles as degraded when both constructions time out', async () => {
    vi.useFakeTimers();
    const { boundary, lifecycle, transitions } = setup(
      { construct: 'never' },
      { initTimeoutMs: 100, minimalInitTimeoutMs: 100 }
    );

    const pending = lifecycle.initialize({});
    await vi.advanceTimersByTimeAsync(200);
    const state = await pending;

    expect(state.status).toBe('degraded');
    if (state.status === 'degraded') {
      expect(state.reason.code).toBe('INIT_TIMEOUT');
      expect(state.reason.message).toBe('Native construction (minimal) exceeded 50ms');
    }
    expect(boundary.calls.construct).toBe(2);
    expect(boundary.trace).toEqual(['cancel:1', 'free:1', 'cancel:2', 'free:2']);
    expect(lifecycle.channel()).toBeNull();
    expect(transitions).toEqual(['not_initialized->initializing', 'initializing->degraded']);
  });

  it('settles as degraded within the default init budget', async () => {
    vi.useFakeTimers();
    const { boundary, lifecycle } = setup({ construct: 'never' });

    const pending = lifecycle.initialize({});
    await vi.advanceTimersByTimeAsync(14_999);
    expect(lifecycle.state.status).toBe('initializing');
    expect(boundary.calls.construct).toBe(2);

    await vi.advanceTimersByTimeAsync(1);
    const state = await pending;

    expect(state.status).toBe('degraded');
    if (state.status === 'degraded') {
      expect(state.reason.message).toBe('Native construction (minimal) exceeded 5000ms');
    }
    expect(boundary.trace).toEqual(['cancel:1', 'free:1', 'cancel:2', 'free:2']);
  });

  it('answers a degraded lifecycle from the fallback', async () => {
    vi.useFakeTimers();
    const { lifecycle, events } = setup({ construct: 'never' }, { initTimeoutMs: 100, minimalInitTimeoutMs: 100 });
    const facade = new QueryFacade({ lifecycle, events });
    const pending = lifecycle.initialize({});
    await vi.advanceTimersByTimeAsync(200);
    await pending;

    const result = await facade.analyze({ kind: 'token', payload: 'BTC', language: 'en' });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.sources).toEqual(['fallback']);
      expect(result.value.confidence).toBeLessThanOrEqual(0.7);
      expect(result.value.text.split('\n')[0]).toBe('# Token Analysis: BTC (Bitcoin)');
    }
  });

  it('becomes ready on the minimal configuration after a primary timeout', async () => {
    vi.useFakeTimers();
    const { boundary, lifecycle, transitions } = setup(
      { construct: ['never', 'ok'] },
      { initTimeoutMs: 100 }
    );

    const pending = lifecycle.initialize({
      vectorStoreUrl: 'http://localhost:6333',
      chainRpcUrl: 'https://api.devnet.solana.com',
      enableChainFeatures: true,
    });
    await vi.advanceTimersByTimeAsync(100);
    const state = await pending;

    expect(state.status).toBe('ready');
    expect(boundary.configs[1]).toEqual({ apiKeys: {}, preferredProvider: 'mock', enableChainFeatures: false });
    expect(transitions).toEqual(['not_initialized->initializing', 'initializing->ready']);
  });

  it('skips the minimal attempt when it is disabled', async () => {
    vi.useFakeTimers();
    const { boundary, lifecycle } = setup({ construct: 'never' }, { initTimeoutMs: 100, minimalFallback: false });

    const pending = lifecycle.initialize({});
    await vi.advanceTimersByTimeAsync(100);
    const state = await pending;

    expect(state.status).toBe('degraded');
    expect(boundary.calls.construct).toBe(1);
  });

  it('rejects an invalid configuration before constructing', async () => {
    const { boundary, lifecycle } = setup();

    await expect(lifecycle.initialize({ preferredProvider: 'groq' })).rejects.toMatchObject({
      code: 'INIT_CONFIG_INVALID',
      message: 'Invalid advisor configuration: validation failed',
      issues: ['apiKeys.groq: API key required for preferred provider "groq"'],
    });
    expect(lifecycle.state.status).toBe('failed');
    expect(boundary.calls.construct).toBe(0);
  });

  it('fails when the native side rejects the configuration', async () => {
    const { lifecycle } = setup({ construct: { code: 'invalid_config', message: 'unknown model' } });

    await expect(lifecycle.initialize({})).rejects.toMatchObject({
      code: 'INIT_CONFIG_INVALID',
      nativeCode: 'invalid_config',
    });
    const state = lifecycle.state;
    expect(state.status === 'failed' && state.error.message).toBe('Invalid advisor configuration: unknown model');
  });

  it('throws NativeUnavailable only on the first attempt', async () => {
    const loader = vi.fn(() => {
      throw new Error('library not found');
    });
    const lifecycle = new SystemLifecycle({ loader, events: new AdvisorEventBus() });

    await expect(lifecycle.initialize({})).rejects.toMatchObject({ code: 'NATIVE_UNAVAILABLE' });
    lifecycle.teardown();
    const second = await lifecycle.initialize({});

    expect(second.status).toBe('failed');
    expect(second.status === 'failed' && second.error.code).toBe('NATIVE_UNAVAILABLE');
    expect(loader).toHaveBeenCalledTimes(1);
  });
});

describe('SystemLifecycle.teardown', () => {
  it('destroys the handle once and is idempotent', async () => {
    const { boundary, lifecycle, transitions } = setup();
    await lifecycle.initialize({});

    lifecycle.teardown();
    lifecycle.teardown();

    expect(lifecycle.state).toEqual({ status: 'not_initialized' });
    expect(boundary.destroyed).toEqual([1]);
    expect(lifecycle.channel()).toBeNull();
    expect(transitions.filter((transition) => transition.endsWith('->not_initialized'))).toEqual([
      'ready->not_initialized',
    ]);
  });

  it('is safe before initialization', () => {
    const { lifecycle, transitions } = setup();

    lifecycle.teardown();

    expect(transitions).toEqual([]);
  });

  it('cancels a construction in progress', async () => {
    const { boundary, lifecycle } = setup({ construct: 'never' });
    const pending = lifecycle.initialize({});
    await settleTasks();

    lifecycle.teardown();
    const state = await pending;

    expect(state).toEqual({ status: 'not_initialized' });
    expect(boundary.trace).toEqual(['cancel:1', 'free:1']);
    expect(boundary.liveCount).toBe(0);
  });

  it('cancels in-flight calls', async () => {
    const { boundary, lifecycle } = setup({ invoke: () => 'never' });
    await lifecycle.initialize({});
    const channel = lifecycle.channel();
    if (!channel) throw new Error('expected a channel');
    const call = channel.callOnce('query', { payload: 'What is riba?', language: 'en' }, { timeoutMs: 0 });
    expect(lifecycle.inFlightCount).toBe(1);

    lifecycle.teardown();
    const result = await call;

    expect(!result.ok && result.error.message).toBe('Native call query torn down');
    expect(boundary.liveCount).toBe(0);
    expect(lifecycle.inFlightCount).toBe(0);
  });

  it('restarts with a fresh handle', async () => {
    const { boundary, lifecycle } = setup();
    await lifecycle.initialize({});

    const state = await lifecycle.restart({});

    expect(state.status).toBe('ready');
    expect(boundary.calls.construct).toBe(2);
    expect(boundary.destroyed).toEqual([1]);
  });
});

describe('SystemLifecycle.describe', () => {
  it('describes the native system only when ready', async () => {
    const { lifecycle } = setup();
    expect(lifecycle.describe()).toEqual({ state: { status: 'not_initialized' }, system: null });

    await lifecycle.initialize({});

    expect(lifecycle.describe().system).toEqual({
      agent: 'Scripted Agent',
      usingRealAi: false,
      storage: 'memory',
      vectorSearch: false,
    });
  });
});
