/**
 * @fileoverview Lifting native answer records into host values.
 */

import { z } from 'zod';
import { Errors, type ErrorInfo } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { QueryResponse } from '../types.js';
import { formatIssues } from '../config/schema.js';

export const NativeQueryRecordSchema = z.object({
  queryId: z.string().min(1),
  response: z.string(),
  confidence: z.number().min(0).max(1),
  sources: z.array(z.string()),
  followUps: z.array(z.string()).optional(),
  timestamp: z.number().nonnegative(),
  analysisId: z.string().min(1).optional(),
});

/** Build a frozen QueryResponse. Arrays are copied and frozen too. */
export function freezeResponse(response: QueryResponse): QueryResponse {
  return Object.freeze({
    ...response,
    sources: Object.freeze([...response.sources]),
    followUps: Object.freeze([...response.followUps]),
  });
}

/**
 * Validate a record received from the native side and convert it.
 * Native timestamps are in seconds.
 */
export function liftQueryRecord(record: unknown, operation: string): Result<QueryResponse, ErrorInfo> {
  const parsed = NativeQueryRecordSchema.safeParse(record);
  if (!parsed.success) {
    return Err(
      Errors.native(
        'invalid_response',
        `Malformed ${operation} response: ${formatIssues(parsed.error).join('; ')}`,
        operation
      ).toInfo()
    );
  }
  const value = parsed.data;
  const response: QueryResponse = {
    id: value.queryId,
    text: value.response,
    confidence: value.confidence,
    sources: value.sources,
    followUps: value.followUps ?? [],
    createdAt: Math.round(value.timestamp * 1000),
    ...(value.analysisId ? { analysisId: value.analysisId } : {}),
  };
  return Ok(freezeResponse(response));
}
