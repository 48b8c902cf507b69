/**
 * @fileoverview Shared types for the advisory bridge.
 */

import type { ErrorInfo } from './core/errors.js';

// ============================================================================
// QUERIES
// ============================================================================

export const QUERY_KINDS = ['token', 'text', 'contract', 'audio', 'chat_message'] as const;

export type QueryKind = (typeof QUERY_KINDS)[number];

/** One immutable query from presentation code. */
export interface QueryRequest {
  readonly kind: QueryKind;
  /** Text for token/text/contract/chat queries; raw bytes for audio. */
  readonly payload: string | Uint8Array;
  readonly userId?: string;
  readonly language: string;
  /** Logical conversation used for stream supersession. */
  readonly conversationId?: string;
}

export interface QueryResponse {
  readonly id: string;
  readonly text: string;
  /** In [0, 1]. */
  readonly confidence: number;
  readonly sources: readonly string[];
  readonly followUps: readonly string[];
  /** Epoch milliseconds. */
  readonly createdAt: number;
  readonly analysisId?: string;
}

// ============================================================================
// STREAMING
// ============================================================================

export interface StreamChunk {
  /** Starts at 0 and increases by one per chunk of a request. */
  readonly sequence: number;
  readonly content: string;
}

export type AggregationResult =
  | { readonly accumulatedText: string; readonly isFinal: false }
  | { readonly accumulatedText: string; readonly isFinal: true; readonly response: QueryResponse }
  | { readonly accumulatedText: string; readonly isFinal: true; readonly error: ErrorInfo };

/** Callbacks a caller supplies to receive a streamed answer. */
export interface StreamHandlers {
  /** Receives the full answer so far, never a bare fragment. */
  onChunk(cumulativeText: string): void;
  onComplete(response: QueryResponse): void;
  onError(error: ErrorInfo): void;
}

// ============================================================================
// BACKEND DESCRIPTION
// ============================================================================

export interface BackendInfo {
  mode: 'native' | 'fallback';
  lifecycle: string;
  agent: string;
  usingRealAi: boolean;
  network?: string;
}
