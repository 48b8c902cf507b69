/**
 * @fileoverview Shared command plumbing: common flags and advisor setup
 */

import { createAdvisor, type Advisor, type AdvisorOptions } from '../advisor.js';
import { loadConfigFromEnv, loadLifecycleOptionsFromEnv } from '../config/env.js';
import type { AdvisorConfigInput, FacadeOptionsInput } from '../config/schema.js';
import type { LifecycleState } from '../lifecycle/system_lifecycle.js';
import { createLogger } from '../telemetry/logger.js';
import { QUERY_KINDS, type QueryKind } from '../types.js';
import { getErrorMessage } from '../utils/errors.js';
import { createError } from './errors.js';

const log = createLogger('cli');

export const COMMON_OPTIONS = {
  json: { type: 'boolean', default: false },
  verbose: { type: 'boolean', default: false },
  language: { type: 'string', short: 'l', default: 'en' },
  user: { type: 'string', short: 'u' },
  timeout: { type: 'string' },
} as const;

export type Env = Record<string, string | undefined>;

export interface CommandOptions {
  rawArgs: string[];
  env?: Env;
  /** Replaces {@link createAdvisor}. */
  advisorFactory?: (options: AdvisorOptions) => Advisor;
}

export interface AdvisorSession {
  advisor: Advisor;
  config: AdvisorConfigInput;
}

/** `--timeout` in milliseconds; absent means the facade defaults. */
export function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value <= 0 || String(value) !== raw.trim()) {
    throw createError('INVALID_ARGUMENT', `--timeout must be a positive number of milliseconds (got "${raw}")`);
  }
  return value;
}

export function parseQueryKind(raw: string | undefined): QueryKind {
  const kind = QUERY_KINDS.find((candidate) => candidate === raw);
  if (!kind) {
    throw createError('INVALID_ARGUMENT', `Query kind must be one of ${QUERY_KINDS.join(', ')} (got "${raw ?? ''}")`);
  }
  return kind;
}

/**
 * Build an advisor from the environment, run `fn`, and always tear down so
 * the process can exit.
 */
export async function withAdvisor<T>(
  options: CommandOptions,
  timeoutMs: number | undefined,
  fn: (session: AdvisorSession) => Promise<T>
): Promise<T> {
  const env = options.env ?? process.env;
  let config: AdvisorConfigInput;
  try {
    config = loadConfigFromEnv(env);
  } catch (error) {
    throw createError('CONFIG_INVALID', getErrorMessage(error));
  }
  const facade: FacadeOptionsInput | undefined = timeoutMs
    ? { callTimeoutMs: timeoutMs, streamTimeoutMs: timeoutMs }
    : undefined;
  const factory = options.advisorFactory ?? createAdvisor;
  const advisor = factory({ lifecycle: loadLifecycleOptionsFromEnv(env), facade });
  try {
    return await fn({ advisor, config });
  } finally {
    advisor.shutdown();
  }
}

/**
 * Initialize for a query command. A failed start leaves the advisor on its
 * fallback, so the failure is only logged.
 */
export async function initializeForQueries(session: AdvisorSession): Promise<LifecycleState> {
  try {
    return await session.advisor.initialize(session.config);
  } catch (error) {
    log.warn('native subsystem unavailable, answering from fallback', { error: getErrorMessage(error) });
    return session.advisor.lifecycle.state;
  }
}
