/**
 * @fileoverview In-process native boundary
 *
 * Implements the poll/complete/cancel/free future protocol over the advisory
 * engine, inside the host process. Allocation and free counters make leaks
 * and double frees observable.
 *
 * @packageDocumentation
 */

import { AdvisoryEngine, type AdvisoryEngineOptions } from '../engine/advisory_engine.js';
import { EngineError, isEngineError } from '../engine/engine_error.js';
import { createLogger } from '../telemetry/logger.js';
import { delay } from '../utils/async.js';
import { chunkText } from '../utils/chunk_text.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  FutureHandle,
  NATIVE_CONTRACT_VERSION,
  SystemHandle,
  type NativeArgs,
  type NativeBoundary,
  type NativeOperation,
  type NativeOutcome,
  type NativeQueryRecord,
  type NativeStreamCallback,
  type NativeSystemConfig,
  type NativeSystemDescription,
  type PollStatus,
} from './types.js';

const log = createLogger('InProcessBoundary');

export interface InProcessBoundaryOptions {
  engine?: AdvisoryEngineOptions;
  /** Characters per streamed chunk. */
  streamChunkSize?: number;
  streamChunkDelayMs?: number;
}

export interface BoundaryStats {
  allocated: number;
  freed: number;
  cancelled: number;
  live: number;
  systems: number;
}

interface ValueDisposer<T> {
  dispose(value: T): void;
}

class InProcessFuture<T> extends FutureHandle<T> {
  outcome: NativeOutcome<T> | null = null;
  readonly controller = new AbortController();
  private waker: (() => void) | null = null;

  constructor(
    id: number,
    /** Disposes a value nobody will read, e.g. a handle built after cancellation. */
    private readonly disposer?: ValueDisposer<T>,
  ) {
    super(id);
  }

  park(wake: () => void): void {
    this.waker = wake;
  }

  settle(outcome: NativeOutcome<T>): void {
    if (this.outcome) {
      if (outcome.status === 'ok') this.disposer?.dispose(outcome.value);
      return;
    }
    this.outcome = outcome;
    const wake = this.waker;
    this.waker = null;
    wake?.();
  }

  /** Drop an unread successful value. */
  abandon(): void {
    if (this.outcome?.status === 'ok') {
      this.disposer?.dispose(this.outcome.value);
      this.outcome = { status: 'cancelled' };
    }
  }
}

function toErrorOutcome(error: unknown): NativeOutcome<never> {
  if (isEngineError(error)) {
    return { status: 'error', code: error.code, message: error.message };
  }
  return { status: 'error', code: 'internal', message: getErrorMessage(error) };
}

export class InProcessBoundary implements NativeBoundary {
  readonly contractVersion = NATIVE_CONTRACT_VERSION;

  private nextFutureId = 1;
  private nextSystemId = 1;
  private readonly futures = new Map<number, InProcessFuture<unknown>>();
  private readonly systems = new Map<number, AdvisoryEngine>();
  private allocated = 0;
  private freed = 0;
  private cancelled = 0;
  private readonly streamChunkSize: number;
  private readonly streamChunkDelayMs: number;

  constructor(private readonly options: InProcessBoundaryOptions = {}) {
    this.streamChunkSize = options.streamChunkSize ?? 24;
    this.streamChunkDelayMs = options.streamChunkDelayMs ?? 25;
  }

  get stats(): BoundaryStats {
    return {
      allocated: this.allocated,
      freed: this.freed,
      cancelled: this.cancelled,
      live: this.futures.size,
      systems: this.systems.size,
    };
  }

  /** The engine behind a live handle. */
  engineFor(handle: SystemHandle): AdvisoryEngine | undefined {
    return this.systems.get(handle.id);
  }

  construct(config: NativeSystemConfig): FutureHandle<SystemHandle> {
    return this.spawn(
      async (signal) => {
        const engine = await AdvisoryEngine.open(config, this.options.engine, signal);
        if (signal.aborted) {
          engine.close();
          throw new Error('construction cancelled');
        }
        const handle = new SystemHandle(this.nextSystemId++);
        this.systems.set(handle.id, engine);
        return handle;
      },
      { dispose: (handle) => this.destroy(handle) }
    );
  }

  invoke(handle: SystemHandle, operation: NativeOperation, args: NativeArgs): FutureHandle<NativeQueryRecord> {
    return this.spawn((signal) => this.requireEngine(handle).execute(operation, args, signal));
  }

  invokeStreaming(
    handle: SystemHandle,
    operation: NativeOperation,
    args: NativeArgs,
    callback: NativeStreamCallback
  ): FutureHandle<void> {
    return this.spawn(async (signal) => {
      let record: NativeQueryRecord;
      try {
        record = await this.requireEngine(handle).execute(operation, args, signal);
      } catch (error) {
        if (signal.aborted) throw error;
        callback.onError(getErrorMessage(error));
        return;
      }
      const chunks = chunkText(record.response, this.streamChunkSize);
      for (const [chunkIndex, content] of chunks.entries()) {
        if (signal.aborted) return;
        callback.onChunk({ chunkIndex, content });
        if (this.streamChunkDelayMs > 0) await delay(this.streamChunkDelayMs, signal);
      }
      if (!signal.aborted) callback.onComplete(record);
    });
  }

  poll(future: FutureHandle<unknown>, wake: () => void): PollStatus {
    const slot = this.requireLive(future);
    if (slot.outcome) return 'ready';
    slot.park(wake);
    return 'pending';
  }

  complete<T>(future: FutureHandle<T>): NativeOutcome<T> {
    this.requireLive(future);
    if (!(future instanceof InProcessFuture)) {
      throw new Error(`${future} does not belong to this boundary`);
    }
    if (!future.outcome) {
      throw new Error(`${future} is not ready`);
    }
    return future.outcome;
  }

  cancel(future: FutureHandle<unknown>): void {
    const slot = this.requireLive(future);
    this.cancelled++;
    slot.controller.abort('cancelled');
    if (slot.outcome) {
      slot.abandon();
      return;
    }
    slot.settle({ status: 'cancelled' });
  }

  free(future: FutureHandle<unknown>): void {
    const slot = this.futures.get(future.id);
    if (!slot) {
      throw new Error(`double free or unknown ${future}`);
    }
    if (!slot.outcome) slot.controller.abort('freed');
    this.futures.delete(future.id);
    this.freed++;
  }

  destroy(handle: SystemHandle): void {
    const engine = this.systems.get(handle.id);
    if (!engine) return;
    this.systems.delete(handle.id);
    engine.close();
    log.debug('system destroyed', { handle: handle.toString() });
  }

  describe(handle: SystemHandle): NativeSystemDescription {
    return this.requireEngine(handle).describe();
  }

  private spawn<T>(task: (signal: AbortSignal) => Promise<T>, disposer?: ValueDisposer<T>): InProcessFuture<T> {
    const future = new InProcessFuture<T>(this.nextFutureId++, disposer);
    this.futures.set(future.id, future);
    this.allocated++;
    const signal = future.controller.signal;
    void Promise.resolve()
      .then(() => task(signal))
      .then(
        (value) => future.settle({ status: 'ok', value }),
        (error: unknown) => future.settle(signal.aborted ? { status: 'cancelled' } : toErrorOutcome(error))
      );
    return future;
  }

  private requireLive(future: FutureHandle<unknown>): InProcessFuture<unknown> {
    const slot = this.futures.get(future.id);
    if (!slot) {
      throw new Error(`${future} is not live`);
    }
    return slot;
  }

  private requireEngine(handle: SystemHandle): AdvisoryEngine {
    const engine = this.systems.get(handle.id);
    if (!engine) {
      throw new EngineError('invalid_handle', `${handle} is not a live system`);
    }
    return engine;
  }
}
