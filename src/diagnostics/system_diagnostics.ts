/**
 * @fileoverview Step-by-step advisor diagnostics
 *
 * Runs the checks in order (configuration, initialization, one token
 * analysis, one general query) and reports each one. API keys only ever
 * appear masked.
 *
 * @packageDocumentation
 */

import { AdvisorConfigSchema, formatIssues, type AdvisorConfigInput } from '../config/schema.js';
import { FALLBACK_SOURCE } from '../fallback/canned_fallback.js';
import type { SystemLifecycle } from '../lifecycle/system_lifecycle.js';
import type { QueryFacade } from '../query/query_facade.js';
import { createLogger } from '../telemetry/logger.js';
import type { QueryRequest } from '../types.js';
import { getErrorMessage, maskSecret } from '../utils/errors.js';

const log = createLogger('Diagnostics');

// ============================================================================
// TYPES
// ============================================================================

export type CheckStatus = 'OK' | 'WARNING' | 'ERROR';

export interface DiagnosticCheck {
  name: string;
  status: CheckStatus;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
}

export interface DiagnosticsReport {
  timestamp: string;
  overallStatus: CheckStatus;
  checks: DiagnosticCheck[];
  summary: {
    total: number;
    ok: number;
    warnings: number;
    errors: number;
  };
}

export interface DiagnosticsOptions {
  config: AdvisorConfigInput;
  lifecycle: SystemLifecycle;
  facade: QueryFacade;
  now?: () => Date;
}

export const DIAGNOSTIC_TOKEN_QUERY: QueryRequest = { kind: 'token', payload: 'BTC', language: 'en' };
export const DIAGNOSTIC_TEXT_QUERY: QueryRequest = {
  kind: 'text',
  payload: 'What is the ruling on prayer times?',
  language: 'en',
};

// ============================================================================
// CHECKS
// ============================================================================

function checkConfiguration(config: AdvisorConfigInput): DiagnosticCheck {
  const maskedKeys = Object.fromEntries(
    Object.entries(config.apiKeys ?? {}).map(([provider, key]) => [provider, maskSecret(key)])
  );
  const parsed = AdvisorConfigSchema.safeParse(config);
  if (!parsed.success) {
    return {
      name: 'Configuration',
      status: 'ERROR',
      message: 'Configuration is invalid',
      details: { apiKeys: maskedKeys, issues: formatIssues(parsed.error) },
      suggestion: 'Set an API key for the preferred provider or choose the mock provider',
    };
  }
  const check: DiagnosticCheck = {
    name: 'Configuration',
    status: 'OK',
    message: `Preferred provider: ${parsed.data.preferredProvider}`,
    details: {
      apiKeys: maskedKeys,
      storage: parsed.data.storagePath ?? 'memory',
      chainFeatures: parsed.data.enableChainFeatures,
      ...(parsed.data.modelName ? { modelName: parsed.data.modelName } : {}),
    },
  };
  if (parsed.data.preferredProvider === 'mock') {
    check.status = 'WARNING';
    check.message = 'No AI provider configured; the mock agent will answer';
    check.suggestion = 'Set GROQ_API_KEY, OPENAI_API_KEY or XAI_API_KEY to use a real provider';
  }
  return check;
}

async function checkInitialization(lifecycle: SystemLifecycle, config: AdvisorConfigInput): Promise<DiagnosticCheck> {
  const name = 'System Initialization';
  try {
    const state = await lifecycle.initialize(config);
    switch (state.status) {
      case 'ready': {
        const { system } = lifecycle.describe();
        return {
          name,
          status: 'OK',
          message: system ? `Native subsystem ready (${system.agent})` : 'Native subsystem ready',
          ...(system ? { details: { ...system } } : {}),
        };
      }
      case 'degraded':
        return {
          name,
          status: 'WARNING',
          message: `Running in degraded mode: ${state.reason.message}`,
          suggestion: 'Answers come from the offline fallback until the subsystem is restarted',
        };
      case 'failed':
        return { name, status: 'ERROR', message: state.error.message, details: { code: state.error.code } };
      default:
        return { name, status: 'ERROR', message: `Lifecycle ended in state ${state.status}` };
    }
  } catch (error) {
    return { name, status: 'ERROR', message: getErrorMessage(error) };
  }
}

async function checkQuery(facade: QueryFacade, name: string, request: QueryRequest): Promise<DiagnosticCheck> {
  const started = Date.now();
  try {
    const result = await facade.analyze(request);
    const durationMs = Date.now() - started;
    if (!result.ok) {
      return {
        name,
        status: 'ERROR',
        message: result.error.message,
        details: { code: result.error.code, durationMs },
      };
    }
    const response = result.value;
    const details = {
      id: response.id,
      confidence: response.confidence,
      sources: [...response.sources],
      durationMs,
    };
    if (response.sources.includes(FALLBACK_SOURCE)) {
      return { name, status: 'WARNING', message: 'Answered from the offline fallback', details };
    }
    return { name, status: 'OK', message: `Answered with confidence ${response.confidence}`, details };
  } catch (error) {
    return { name, status: 'ERROR', message: getErrorMessage(error) };
  }
}

// ============================================================================
// REPORT
// ============================================================================

export function summarizeChecks(checks: DiagnosticCheck[]): Pick<DiagnosticsReport, 'overallStatus' | 'summary'> {
  const summary = { total: checks.length, ok: 0, warnings: 0, errors: 0 };
  for (const check of checks) {
    switch (check.status) {
      case 'OK':
        summary.ok++;
        break;
      case 'WARNING':
        summary.warnings++;
        break;
      case 'ERROR':
        summary.errors++;
        break;
    }
  }
  const overallStatus: CheckStatus = summary.errors > 0 ? 'ERROR' : summary.warnings > 0 ? 'WARNING' : 'OK';
  return { overallStatus, summary };
}

export async function runDiagnostics(options: DiagnosticsOptions): Promise<DiagnosticsReport> {
  const { config, lifecycle, facade } = options;
  const timestamp = (options.now ?? (() => new Date()))().toISOString();

  const checks: DiagnosticCheck[] = [checkConfiguration(config)];
  checks.push(await checkInitialization(lifecycle, config));
  checks.push(await checkQuery(facade, 'Token Analysis', DIAGNOSTIC_TOKEN_QUERY));
  checks.push(await checkQuery(facade, 'General Query', DIAGNOSTIC_TEXT_QUERY));

  const report: DiagnosticsReport = { timestamp, checks, ...summarizeChecks(checks) };
  log.info('diagnostics finished', { overallStatus: report.overallStatus, ...report.summary });
  return report;
}
