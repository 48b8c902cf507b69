/**
 * @fileoverview Zod schemas for advisor configuration.
 *
 * `AdvisorConfig` is what the native subsystem is constructed with; the
 * option objects tune the host-side lifecycle and facade.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { QUERY_KINDS } from '../types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_INIT_TIMEOUT_MS = 15_000;
export const DEFAULT_MINIMAL_INIT_TIMEOUT_MS = 5_000;
export const DEFAULT_CALL_TIMEOUT_MS = 30_000;
export const DEFAULT_STREAM_TIMEOUT_MS = 120_000;
export const DEFAULT_FALLBACK_CHUNK_SIZE = 20;
export const DEFAULT_FALLBACK_CHUNK_DELAY_MS = 100;

export const PROVIDERS = ['mock', 'groq', 'openai', 'grok'] as const;

export const ProviderSchema = z.enum(PROVIDERS);

export type ProviderName = z.infer<typeof ProviderSchema>;

// ============================================================================
// ADVISOR CONFIG
// ============================================================================

export const AdvisorConfigSchema = z
  .object({
    apiKeys: z.record(z.string().min(1), z.string()).default({}),
    preferredProvider: ProviderSchema.default('mock'),
    modelName: z.string().min(1).optional(),
    vectorStoreUrl: z.string().url().optional(),
    chainRpcUrl: z.string().url().optional(),
    enableChainFeatures: z.boolean().default(false),
    /** Absent means the native side keeps its store in memory. */
    storagePath: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((config, ctx) => {
    const provider = config.preferredProvider;
    if (provider !== 'mock' && !config.apiKeys[provider]?.trim()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['apiKeys', provider],
        message: `API key required for preferred provider "${provider}"`,
      });
    }
    if (config.enableChainFeatures && !config.chainRpcUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['chainRpcUrl'],
        message: 'chainRpcUrl is required when enableChainFeatures is true',
      });
    }
  });

export type AdvisorConfigInput = z.input<typeof AdvisorConfigSchema>;
export type AdvisorConfig = z.output<typeof AdvisorConfigSchema>;

/**
 * The reduced configuration tried once after the primary construction times
 * out: optional subsystems (vector search, chain connectivity) are disabled.
 */
export function toMinimalConfig(config: AdvisorConfig): AdvisorConfig {
  const { vectorStoreUrl: _vector, chainRpcUrl: _chain, ...rest } = config;
  return { ...rest, enableChainFeatures: false };
}

/** Flattened zod issues, `path: message`. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

// ============================================================================
// HOST OPTIONS
// ============================================================================

/**
 * `initTimeoutMs` bounds the whole startup. With `minimalFallback` on, the
 * minimal retry gets `minimalInitTimeoutMs` of it (at most half) and the
 * primary attempt the rest.
 */
export const LifecycleOptionsSchema = z
  .object({
    initTimeoutMs: z.number().int().positive().default(DEFAULT_INIT_TIMEOUT_MS),
    minimalInitTimeoutMs: z.number().int().positive().default(DEFAULT_MINIMAL_INIT_TIMEOUT_MS),
    minimalFallback: z.boolean().default(true),
  })
  .strict();

export type LifecycleOptionsInput = z.input<typeof LifecycleOptionsSchema>;
export type LifecycleOptions = z.output<typeof LifecycleOptionsSchema>;

export const FacadeOptionsSchema = z
  .object({
    callTimeoutMs: z.number().int().positive().default(DEFAULT_CALL_TIMEOUT_MS),
    streamTimeoutMs: z.number().int().positive().default(DEFAULT_STREAM_TIMEOUT_MS),
    fallbackChunkSize: z.number().int().positive().default(DEFAULT_FALLBACK_CHUNK_SIZE),
    fallbackChunkDelayMs: z.number().int().min(0).default(DEFAULT_FALLBACK_CHUNK_DELAY_MS),
  })
  .strict();

export type FacadeOptionsInput = z.input<typeof FacadeOptionsSchema>;
export type FacadeOptions = z.output<typeof FacadeOptionsSchema>;

// ============================================================================
// QUERY REQUEST
// ============================================================================

export const QueryRequestSchema = z
  .object({
    kind: z.enum(QUERY_KINDS),
    payload: z.union([
      z.string().trim().min(1, 'payload must not be empty'),
      z.instanceof(Uint8Array).refine((bytes) => bytes.length > 0, 'payload must not be empty'),
    ]),
    userId: z.string().min(1).optional(),
    language: z.string().min(2).max(16),
    conversationId: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((request, ctx) => {
    if (request.kind === 'audio' && typeof request.payload === 'string') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['payload'],
        message: 'audio queries carry raw bytes',
      });
    }
    if (request.kind !== 'audio' && typeof request.payload !== 'string') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['payload'],
        message: `${request.kind} queries carry text`,
      });
    }
  });
