/**
 * @fileoverview Native subsystem lifecycle
 *
 * Owns the boundary, the call adapter and the single SystemHandle. Startup
 * is single-flight and bounded by `initTimeoutMs`: a primary construction
 * that times out is retried once with a minimal configuration within the
 * remaining budget, and if that also times out the lifecycle settles as
 * `degraded` instead of failing.
 *
 * ```
 * not_initialized ──initialize──▶ initializing ──▶ ready
 *        ▲                              │ ├──────▶ degraded (init timeout)
 *        └────────── teardown ──────────┘ └──────▶ failed   (boundary / config)
 * ```
 *
 * @packageDocumentation
 */

import {
  Errors,
  type AdvisorError,
  type ErrorInfo,
  type NativeUnavailableError,
} from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import {
  AdvisorConfigSchema,
  LifecycleOptionsSchema,
  formatIssues,
  toMinimalConfig,
  type AdvisorConfig,
  type AdvisorConfigInput,
  type LifecycleOptions,
  type LifecycleOptionsInput,
} from '../config/schema.js';
import { createLifecycleStateChangedEvent, globalEventBus, type AdvisorEventBus } from '../events.js';
import {
  NativeCallAdapter,
  type CallOptions,
  type StreamCallbacks,
  type StreamSubscription,
} from '../native/future_adapter.js';
import { loadNativeBoundary } from '../native/loader.js';
import type {
  NativeArgs,
  NativeBoundary,
  NativeBoundaryLoader,
  NativeOperation,
  NativeSystemDescription,
  SystemHandle,
} from '../native/types.js';
import { createLogger } from '../telemetry/logger.js';
import type { QueryResponse } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';

const log = createLogger('SystemLifecycle');

// ============================================================================
// TYPES
// ============================================================================

export type LifecycleState =
  | { readonly status: 'not_initialized' }
  | { readonly status: 'initializing' }
  | { readonly status: 'ready' }
  | { readonly status: 'degraded'; readonly reason: ErrorInfo }
  | { readonly status: 'failed'; readonly error: ErrorInfo };

export type LifecycleStatus = LifecycleState['status'];

/** Native calls bound to the current handle. */
export interface NativeChannel {
  callOnce(operation: NativeOperation, args: NativeArgs, options: CallOptions): Promise<Result<QueryResponse, ErrorInfo>>;
  callStreaming(
    operation: NativeOperation,
    args: NativeArgs,
    callbacks: StreamCallbacks,
    options: CallOptions
  ): StreamSubscription;
}

export interface LifecycleDescription {
  state: LifecycleState;
  system: NativeSystemDescription | null;
}

export interface SystemLifecycleDeps {
  loader: NativeBoundaryLoader;
  events?: AdvisorEventBus;
  options?: LifecycleOptionsInput;
}

type ConstructAttempt = 'primary' | 'minimal';

const NOT_INITIALIZED: LifecycleState = { status: 'not_initialized' };

// ============================================================================
// LIFECYCLE
// ============================================================================

export class SystemLifecycle {
  private current: LifecycleState = NOT_INITIALIZED;
  private boundary: NativeBoundary | null = null;
  private adapter: NativeCallAdapter | null = null;
  private handle: SystemHandle | null = null;
  private pending: Promise<LifecycleState> | null = null;
  private initAbort: AbortController | null = null;
  /** Attempts started before the latest teardown are stale. */
  private generation = 0;
  /** A boundary that failed to load is never loaded again. */
  private unavailable: NativeUnavailableError | null = null;

  private readonly loader: NativeBoundaryLoader;
  private readonly events: AdvisorEventBus;
  private readonly options: LifecycleOptions;

  constructor(deps: SystemLifecycleDeps) {
    this.loader = deps.loader;
    this.events = deps.events ?? globalEventBus;
    this.options = LifecycleOptionsSchema.parse(deps.options ?? {});
  }

  get state(): LifecycleState {
    return this.current;
  }

  isReady(): boolean {
    return this.current.status === 'ready' && this.handle !== null;
  }

  /** Native calls not yet settled, including an in-progress construction. */
  get inFlightCount(): number {
    return this.adapter?.inFlightCount ?? 0;
  }

  /**
   * Start the native subsystem. Concurrent calls share one attempt; a settled
   * lifecycle returns its state unchanged.
   *
   * @throws NativeUnavailableError when the boundary cannot be loaded (first attempt only)
   * @throws InitConfigInvalidError when the config is rejected here or by the native side
   */
  initialize(config: AdvisorConfigInput): Promise<LifecycleState> {
    if (this.pending) return this.pending;
    if (this.current.status !== 'not_initialized') return Promise.resolve(this.current);
    if (this.unavailable) {
      this.transition({ status: 'failed', error: this.unavailable.toInfo() });
      return Promise.resolve(this.current);
    }

    const generation = ++this.generation;
    const attempt = this.runInitialization(config, generation).finally(() => {
      if (this.generation === generation) {
        this.pending = null;
        this.initAbort = null;
      }
    });
    this.pending = attempt;
    return attempt;
  }

  /**
   * Cancel everything in flight, destroy the handle and return to
   * `not_initialized`. Safe to call in any state, any number of times.
   */
  teardown(): void {
    this.generation++;
    this.pending = null;
    const initAbort = this.initAbort;
    this.initAbort = null;
    initAbort?.abort('torn down');

    const cancelled = this.adapter?.cancelAll('torn down') ?? 0;
    if (cancelled > 0) log.info('cancelled in-flight native calls', { count: cancelled });

    this.releaseHandle();
    if (this.current.status !== 'not_initialized') {
      this.transition(NOT_INITIALIZED, 'teardown');
    }
  }

  async restart(config: AdvisorConfigInput): Promise<LifecycleState> {
    this.teardown();
    return this.initialize(config);
  }

  /** Call surface bound to the live handle; null unless ready. */
  channel(): NativeChannel | null {
    const adapter = this.adapter;
    const handle = this.handle;
    if (!adapter || !handle || this.current.status !== 'ready') return null;
    return {
      callOnce: (operation, args, options) => adapter.callOnce(handle, operation, args, options),
      callStreaming: (operation, args, callbacks, options) =>
        adapter.callStreaming(handle, operation, args, callbacks, options),
    };
  }

  describe(): LifecycleDescription {
    let system: NativeSystemDescription | null = null;
    const boundary = this.boundary;
    const handle = this.handle;
    if (boundary?.describe && handle && this.current.status === 'ready') {
      try {
        system = boundary.describe(handle);
      } catch (error) {
        log.warn('describe failed', { error: getErrorMessage(error) });
      }
    }
    return { state: this.current, system };
  }

  // --------------------------------------------------------------------------
  // Initialization steps
  // --------------------------------------------------------------------------

  private async runInitialization(config: AdvisorConfigInput, generation: number): Promise<LifecycleState> {
    const isCurrent = (): boolean => generation === this.generation;
    const deadline = Date.now() + this.options.initTimeoutMs;
    const initAbort = new AbortController();
    this.initAbort = initAbort;
    this.transition({ status: 'initializing' });

    const adapter = await this.ensureAdapter();
    if (!isCurrent()) return this.current;
    if (!adapter.ok) {
      this.unavailable = adapter.error;
      return this.failWith(adapter.error);
    }

    const parsed = AdvisorConfigSchema.safeParse(config);
    if (!parsed.success) {
      return this.failWith(Errors.configInvalid('validation failed', formatIssues(parsed.error)));
    }

    const { initTimeoutMs, minimalFallback } = this.options;
    const minimalShare = minimalFallback
      ? Math.min(this.options.minimalInitTimeoutMs, Math.floor(initTimeoutMs / 2))
      : 0;
    const attempts: Array<[ConstructAttempt, AdvisorConfig]> = [['primary', parsed.data]];
    if (minimalFallback) {
      attempts.push(['minimal', toMinimalConfig(parsed.data)]);
    }

    let lastTimeout: AdvisorError | null = null;
    for (const [attempt, attemptConfig] of attempts) {
      // The minimal retry only gets what is left of the budget.
      const timeoutMs =
        attempt === 'primary' ? initTimeoutMs - minimalShare : Math.max(1, deadline - Date.now());
      const outcome = await this.construct(adapter.value, attemptConfig, timeoutMs, initAbort.signal);
      if (!isCurrent()) {
        if (outcome.ok) this.destroyQuietly(outcome.value);
        return this.current;
      }
      if (outcome.ok) {
        this.handle = outcome.value;
        log.info('native subsystem ready', { attempt });
        this.transition({ status: 'ready' }, attempt === 'minimal' ? 'minimal configuration' : undefined);
        return this.current;
      }
      if (outcome.error.code !== 'CALL_TIMEOUT') {
        const nativeCode = outcome.error.details?.nativeCode;
        return this.failWith(
          Errors.configInvalid(outcome.error.message, [], typeof nativeCode === 'string' ? nativeCode : undefined)
        );
      }
      lastTimeout = Errors.initTimeout(timeoutMs, attempt);
      log.warn('native construction timed out', { attempt, timeoutMs });
    }

    const reason = (lastTimeout ?? Errors.initTimeout(this.options.initTimeoutMs, 'primary')).toInfo();
    log.warn('continuing in degraded mode', { reason: reason.message });
    this.transition({ status: 'degraded', reason }, reason.message);
    return this.current;
  }

  private async ensureAdapter(): Promise<Result<NativeCallAdapter, NativeUnavailableError>> {
    if (this.adapter) return Ok(this.adapter);
    const loaded = await loadNativeBoundary(this.loader);
    if (!loaded.ok) return loaded;
    this.boundary = loaded.value;
    this.adapter = new NativeCallAdapter(loaded.value, this.events);
    return Ok(this.adapter);
  }

  private construct(
    adapter: NativeCallAdapter,
    config: AdvisorConfig,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<Result<SystemHandle, ErrorInfo>> {
    const boundary = this.boundary;
    if (!boundary) {
      return Promise.resolve(Err(Errors.nativeUnavailable('boundary not loaded').toInfo()));
    }
    try {
      const future = boundary.construct(config);
      return adapter.awaitFuture(future, { operation: 'construct', timeoutMs, signal });
    } catch (error) {
      return Promise.resolve(Err(Errors.native('construct_failed', getErrorMessage(error), 'construct').toInfo()));
    }
  }

  private failWith(error: AdvisorError): never {
    log.error('native subsystem failed', { code: error.code, message: error.message });
    this.transition({ status: 'failed', error: error.toInfo() }, error.message);
    throw error;
  }

  private releaseHandle(): void {
    const handle = this.handle;
    this.handle = null;
    if (handle) this.destroyQuietly(handle);
  }

  private destroyQuietly(handle: SystemHandle): void {
    try {
      this.boundary?.destroy(handle);
    } catch (error) {
      log.warn('destroy failed', { handle: handle.toString(), error: getErrorMessage(error) });
    }
  }

  private transition(next: LifecycleState, reason?: string): void {
    const from = this.current.status;
    this.current = next;
    this.events.emit(createLifecycleStateChangedEvent(from, next.status, reason));
  }
}
