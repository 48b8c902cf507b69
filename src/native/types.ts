/**
 * @fileoverview Native boundary contract
 *
 * The native subsystem is reached through a poll-based future protocol:
 * every asynchronous entry point returns a FutureHandle which the host polls
 * with a wake callback until it reports `ready`, then completes (reads the
 * outcome) and frees. Cancelling a future settles it as `cancelled`; it must
 * still be freed. Freeing a future twice is a protocol error.
 *
 * @packageDocumentation
 */

import type { AdvisorConfig } from '../config/schema.js';

/** Bumped whenever the boundary protocol changes shape. */
export const NATIVE_CONTRACT_VERSION = 1;

// ============================================================================
// HANDLES
// ============================================================================

/** Opaque reference to a constructed native subsystem. */
export class SystemHandle {
  private readonly kind = 'system';

  constructor(readonly id: number) {}

  toString(): string {
    return `${this.kind}#${this.id}`;
  }
}

/** Opaque reference to one native future resolving to `T`. */
export class FutureHandle<T> {
  private readonly resolvesTo?: T;

  constructor(readonly id: number) {}

  toString(): string {
    return `future#${this.id}`;
  }
}

// ============================================================================
// OPERATIONS
// ============================================================================

export const NATIVE_OPERATIONS = [
  'analyze_token',
  'query',
  'analyze_contract',
  'analyze_audio',
  'chat',
] as const;

export type NativeOperation = (typeof NATIVE_OPERATIONS)[number];

export interface NativeArgs {
  readonly payload: string | Uint8Array;
  readonly userId?: string;
  readonly language: string;
}

/** Answer record as the native side produces it. */
export interface NativeQueryRecord {
  queryId: string;
  response: string;
  confidence: number;
  sources: string[];
  followUps?: string[];
  /** Seconds since epoch. */
  timestamp: number;
  analysisId?: string;
}

export interface NativeStreamChunk {
  chunkIndex: number;
  content: string;
}

/**
 * Callback object registered for a streaming call. The native side invokes
 * `onChunk` in order, then one of `onComplete` / `onError`.
 */
export interface NativeStreamCallback {
  onChunk(chunk: NativeStreamChunk): void;
  onComplete(finalResponse: NativeQueryRecord): void;
  onError(message: string): void;
}

// ============================================================================
// OUTCOMES
// ============================================================================

export type PollStatus = 'ready' | 'pending';

export type NativeOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'error'; code: string; message: string }
  | { status: 'cancelled' };

/** Configuration as passed across the boundary. */
export type NativeSystemConfig = AdvisorConfig;

export interface NativeSystemDescription {
  agent: string;
  usingRealAi: boolean;
  network?: string;
  storage: 'memory' | 'file';
  vectorSearch: boolean;
}

// ============================================================================
// BOUNDARY
// ============================================================================

export interface NativeBoundary {
  readonly contractVersion: number;

  construct(config: NativeSystemConfig): FutureHandle<SystemHandle>;
  invoke(handle: SystemHandle, operation: NativeOperation, args: NativeArgs): FutureHandle<NativeQueryRecord>;
  /** The returned future settles when the stream has ended or failed to start. */
  invokeStreaming(
    handle: SystemHandle,
    operation: NativeOperation,
    args: NativeArgs,
    callback: NativeStreamCallback
  ): FutureHandle<void>;

  /** `wake` may be invoked at any time after `pending`, possibly more than once. */
  poll(future: FutureHandle<unknown>, wake: () => void): PollStatus;
  complete<T>(future: FutureHandle<T>): NativeOutcome<T>;
  cancel(future: FutureHandle<unknown>): void;
  free(future: FutureHandle<unknown>): void;

  destroy(handle: SystemHandle): void;
  describe?(handle: SystemHandle): NativeSystemDescription;
}

/** Produces the boundary, or throws when the native library cannot be loaded. */
export type NativeBoundaryLoader = () => NativeBoundary | Promise<NativeBoundary>;
