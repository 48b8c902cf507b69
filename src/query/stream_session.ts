import type { ErrorInfo } from '../core/errors.js';
import { createLogger } from '../telemetry/logger.js';
import type { QueryResponse, StreamHandlers } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';

const log = createLogger('StreamSession');

/**
 * Caller-facing side of one stream. Delivers cumulative text until exactly
 * one terminal callback, and nothing at all once dropped.
 */
export class StreamSession {
  readonly done: Promise<void>;
  private resolveDone: () => void = () => {};
  private ended = false;
  private dropped = false;
  private cancelSource: ((reason: string) => void) | null = null;
  private pendingCancel: string | null = null;

  constructor(
    readonly id: number,
    readonly conversationId: string,
    private readonly handlers: StreamHandlers,
    private readonly onEnd: (session: StreamSession) => void,
  ) {
    this.done = new Promise<void>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get isActive(): boolean {
    return !this.ended;
  }

  get isDropped(): boolean {
    return this.dropped;
  }

  /** Connect the producer's cancel; a cancel requested earlier is applied now. */
  attach(cancel: (reason: string) => void): void {
    this.cancelSource = cancel;
    if (this.pendingCancel !== null) cancel(this.pendingCancel);
  }

  cancel(reason = 'cancelled'): void {
    if (this.ended) return;
    if (this.cancelSource) this.cancelSource(reason);
    else this.pendingCancel = reason;
  }

  /** Silently discard everything still to come and stop the producer. */
  drop(): void {
    if (this.ended) return;
    this.dropped = true;
    this.end();
    this.cancelSource?.('superseded');
  }

  chunk(cumulativeText: string): void {
    if (this.ended) return;
    this.deliver('onChunk', () => this.handlers.onChunk(cumulativeText));
  }

  complete(response: QueryResponse): void {
    if (this.ended) return;
    this.end();
    this.deliver('onComplete', () => this.handlers.onComplete(response));
  }

  fail(error: ErrorInfo): void {
    if (this.ended) return;
    this.end();
    this.deliver('onError', () => this.handlers.onError(error));
  }

  private end(): void {
    this.ended = true;
    this.onEnd(this);
    this.resolveDone();
  }

  private deliver(callback: keyof StreamHandlers, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      log.error(`${callback} handler threw`, { streamId: this.id, error: getErrorMessage(error) });
    }
  }
}
