/**
 * @fileoverview Future adapter for the native boundary
 *
 * Every native operation (construction, single-shot calls, streams) goes
 * through {@link NativeCallAdapter.awaitFuture}, which turns the boundary's
 * poll/complete/cancel/free protocol into a promise of a Result.
 *
 * Resource contract: a future passed to awaitFuture is freed exactly once,
 * whatever ends the call (completion, native error, timeout, abort, or
 * {@link NativeCallAdapter.cancelAll}). Abort and timeout cancel the future
 * before freeing it, synchronously inside the abort event or timer.
 *
 * @packageDocumentation
 */

import { Errors, type AdvisorError, type ErrorInfo } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import {
  createNativeCallFinishedEvent,
  createNativeCallStartedEvent,
  globalEventBus,
  type AdvisorEventBus,
  type NativeCallOutcome,
} from '../events.js';
import { createLogger } from '../telemetry/logger.js';
import type { QueryResponse, StreamChunk } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { liftQueryRecord } from './records.js';
import type {
  FutureHandle,
  NativeArgs,
  NativeBoundary,
  NativeOperation,
  NativeOutcome,
  NativeStreamCallback,
  PollStatus,
  SystemHandle,
} from './types.js';

const log = createLogger('NativeCallAdapter');

// ============================================================================
// TYPES
// ============================================================================

export interface CallOptions {
  /** Non-positive or non-finite disables the timeout. */
  timeoutMs: number;
  /** Aborting cancels and frees the native future. */
  signal?: AbortSignal;
}

export interface AwaitFutureOptions extends CallOptions {
  /** Operation name used in errors, logs and events. */
  operation: string;
  streaming?: boolean;
}

/** Raw stream callbacks: chunks carry their native sequence number. */
export interface StreamCallbacks {
  onChunk(chunk: StreamChunk): void;
  onComplete(response: QueryResponse): void;
  onError(error: ErrorInfo): void;
}

export interface StreamSubscription {
  readonly callId: number;
  /** Ends the stream with a CALL_CANCELLED error unless it already ended. */
  cancel(reason?: string): void;
  /** Resolves once the terminal callback has run. */
  readonly done: Promise<void>;
}

function abortReason(signal: AbortSignal | undefined): string | undefined {
  return typeof signal?.reason === 'string' ? signal.reason : undefined;
}

// ============================================================================
// ADAPTER
// ============================================================================

export class NativeCallAdapter {
  private nextCallId = 1;
  private readonly inFlight = new Map<number, (reason: string) => void>();

  constructor(
    private readonly boundary: NativeBoundary,
    private readonly events: AdvisorEventBus = globalEventBus,
  ) {}

  /** Number of native calls that have not settled yet. */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /**
   * Drive one native future to completion.
   *
   * @returns the future's value, or the ErrorInfo of whatever ended it
   */
  awaitFuture<T>(future: FutureHandle<T>, options: AwaitFutureOptions): Promise<Result<T, ErrorInfo>> {
    const { operation, timeoutMs, signal, streaming = false } = options;
    const callId = this.nextCallId++;
    this.events.emit(createNativeCallStartedEvent(callId, operation, streaming));

    return new Promise<Result<T, ErrorInfo>>((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = (result: Result<T, ErrorInfo>, outcome: NativeCallOutcome): void => {
        if (settled) return;
        settled = true;
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.inFlight.delete(callId);
        this.release(future, operation);
        this.events.emit(createNativeCallFinishedEvent(callId, operation, outcome));
        resolve(result);
      };

      const abortWith = (error: AdvisorError, outcome: NativeCallOutcome): void => {
        if (settled) return;
        try {
          this.boundary.cancel(future);
        } catch (cancelError) {
          log.warn('cancel failed', { operation, future: future.id, error: getErrorMessage(cancelError) });
        }
        finish(Err(error.toInfo()), outcome);
      };

      const onAbort = (): void => {
        abortWith(Errors.cancelled(operation, abortReason(signal)), 'cancelled');
      };

      const pollOnce = (): void => {
        if (settled) return;
        let status: PollStatus;
        try {
          status = this.boundary.poll(future, wake);
        } catch (error) {
          finish(Err(Errors.native('poll_failed', getErrorMessage(error), operation).toInfo()), 'error');
          return;
        }
        if (status === 'ready') {
          const result = this.readOutcome(future, operation);
          finish(result, result.ok ? 'ok' : 'error');
        }
      };

      // Re-polls are deferred so a wake fired inside poll() cannot recurse.
      const wake = (): void => {
        if (!settled) queueMicrotask(pollOnce);
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
      this.inFlight.set(callId, (reason) => abortWith(Errors.cancelled(operation, reason), 'cancelled'));
      if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
        timer = setTimeout(() => {
          abortWith(Errors.callTimeout(operation, timeoutMs), 'timeout');
        }, timeoutMs);
      }
      pollOnce();
    });
  }

  /**
   * Single request/response call.
   */
  async callOnce(
    handle: SystemHandle,
    operation: NativeOperation,
    args: NativeArgs,
    options: CallOptions
  ): Promise<Result<QueryResponse, ErrorInfo>> {
    let future: FutureHandle<unknown>;
    try {
      future = this.boundary.invoke(handle, operation, args);
    } catch (error) {
      return Err(Errors.native('invoke_failed', getErrorMessage(error), operation).toInfo());
    }
    const result = await this.awaitFuture(future, { ...options, operation });
    if (!result.ok) return result;
    return liftQueryRecord(result.value, operation);
  }

  /**
   * Register a streaming call. Exactly one of `onComplete` / `onError` runs,
   * after every delivered chunk; a stream cancelled, timed out or torn down
   * before the native side finished ends with a synthesized error.
   */
  callStreaming(
    handle: SystemHandle,
    operation: NativeOperation,
    args: NativeArgs,
    callbacks: StreamCallbacks,
    options: CallOptions
  ): StreamSubscription {
    const controller = new AbortController();
    let terminal = false;
    let markDone: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      markDone = resolve;
    });

    const terminate = (deliver: () => void): void => {
      if (terminal) return;
      terminal = true;
      try {
        deliver();
      } catch (error) {
        log.error('stream terminal callback threw', { operation, error: getErrorMessage(error) });
      }
      markDone();
    };

    const nativeCallback: NativeStreamCallback = {
      onChunk: (chunk) => {
        if (terminal || controller.signal.aborted) return;
        try {
          callbacks.onChunk({ sequence: chunk.chunkIndex, content: chunk.content });
        } catch (error) {
          log.error('stream chunk callback threw', { operation, error: getErrorMessage(error) });
        }
      },
      onComplete: (record) => {
        if (terminal || controller.signal.aborted) return;
        const lifted = liftQueryRecord(record, operation);
        terminate(() => {
          if (lifted.ok) callbacks.onComplete(lifted.value);
          else callbacks.onError(lifted.error);
        });
      },
      onError: (message) => {
        if (controller.signal.aborted) return;
        terminate(() => callbacks.onError(Errors.native('stream_error', message, operation).toInfo()));
      },
    };

    let future: FutureHandle<void>;
    try {
      future = this.boundary.invokeStreaming(handle, operation, args, nativeCallback);
    } catch (error) {
      terminate(() => callbacks.onError(Errors.native('invoke_failed', getErrorMessage(error), operation).toInfo()));
      return { callId: 0, cancel: () => {}, done };
    }

    const external = options.signal;
    if (external) {
      if (external.aborted) controller.abort(external.reason);
      else external.addEventListener('abort', () => controller.abort(external.reason), { once: true });
    }

    const callId = this.nextCallId;
    const registration = this.awaitFuture(future, {
      operation,
      timeoutMs: options.timeoutMs,
      signal: controller.signal,
      streaming: true,
    });
    void registration
      .then((result) => {
        if (terminal) return;
        if (!result.ok) {
          terminate(() => callbacks.onError(result.error));
          return;
        }
        terminate(() =>
          callbacks.onError(
            Errors.native('stream_incomplete', 'stream ended without a terminal event', operation).toInfo()
          )
        );
      })
      .catch((error: unknown) => {
        log.error('stream registration failed', { operation, error: getErrorMessage(error) });
      });

    return {
      callId,
      cancel: (reason = 'cancelled') => controller.abort(reason),
      done,
    };
  }

  /**
   * Cancel every in-flight call. Each cancelled future is freed and its
   * caller receives CALL_CANCELLED.
   */
  cancelAll(reason = 'torn down'): number {
    const cancels = [...this.inFlight.values()];
    for (const cancel of cancels) cancel(reason);
    return cancels.length;
  }

  private readOutcome<T>(future: FutureHandle<T>, operation: string): Result<T, ErrorInfo> {
    let outcome: NativeOutcome<T>;
    try {
      outcome = this.boundary.complete(future);
    } catch (error) {
      return Err(Errors.native('complete_failed', getErrorMessage(error), operation).toInfo());
    }
    switch (outcome.status) {
      case 'ok':
        return Ok(outcome.value);
      case 'error':
        return Err(Errors.native(outcome.code, outcome.message, operation).toInfo());
      case 'cancelled':
        return Err(Errors.cancelled(operation).toInfo());
    }
  }

  private release(future: FutureHandle<unknown>, operation: string): void {
    try {
      this.boundary.free(future);
    } catch (error) {
      log.error('free failed', { operation, future: future.id, error: getErrorMessage(error) });
    }
  }
}
