/**
 * @fileoverview Chunk aggregation for streamed answers
 *
 * Turns an ordered sequence of fragments into one growing answer. Sequence
 * numbers start at 0 and must increase by exactly one; the first gap or
 * repeat fails the aggregation with PROTOCOL_VIOLATION. Once final, every
 * further call returns the same snapshot.
 */

import { Errors, type ErrorInfo } from '../core/errors.js';
import type { AggregationResult, QueryResponse, StreamChunk } from '../types.js';
import { Mutex } from '../utils/async.js';

export class ChunkAggregator {
  private buffer = '';
  private expectedSequence = 0;
  private final: AggregationResult | null = null;
  private readonly lock = new Mutex();

  /** True once `complete`, `fail` or a protocol violation has ended the aggregation. */
  get isFinal(): boolean {
    return this.final !== null;
  }

  get text(): string {
    return this.buffer;
  }

  feed(chunk: StreamChunk): Promise<AggregationResult> {
    return this.lock.runExclusive(() => {
      if (this.final) return this.final;
      if (chunk.sequence !== this.expectedSequence) {
        return this.finalize({
          accumulatedText: this.buffer,
          isFinal: true,
          error: Errors.protocol(this.expectedSequence, chunk.sequence).toInfo(),
        });
      }
      this.expectedSequence++;
      this.buffer += chunk.content;
      const snapshot: AggregationResult = { accumulatedText: this.buffer, isFinal: false };
      return snapshot;
    });
  }

  /** The completion payload's text replaces whatever was buffered. */
  complete(finalResponse: QueryResponse): Promise<AggregationResult> {
    return this.lock.runExclusive(() => {
      if (this.final) return this.final;
      this.buffer = finalResponse.text;
      return this.finalize({ accumulatedText: this.buffer, isFinal: true, response: finalResponse });
    });
  }

  fail(error: ErrorInfo): Promise<AggregationResult> {
    return this.lock.runExclusive(() => {
      if (this.final) return this.final;
      return this.finalize({ accumulatedText: this.buffer, isFinal: true, error });
    });
  }

  private finalize(result: AggregationResult): AggregationResult {
    this.final = Object.freeze(result);
    return this.final;
  }
}
