import { describe, expect, it } from 'vitest';
import { ScriptedBoundary } from '../../__tests__/helpers/index.js';
import type { AdvisorConfigInput } from '../../config/schema.js';
import { AdvisorEventBus } from '../../events.js';
import { SystemLifecycle } from '../../lifecycle/system_lifecycle.js';
import type { NativeBoundaryLoader } from '../../native/types.js';
import { QueryFacade } from '../../query/query_facade.js';
import { runDiagnostics, summarizeChecks } from '../system_diagnostics.js';

const NOW = new Date('2026-01-15T10:00:00.000Z');

function diagnose(config: AdvisorConfigInput, loader: NativeBoundaryLoader = () => new ScriptedBoundary()) {
  const events = new AdvisorEventBus();
  const lifecycle = new SystemLifecycle({ loader, events });
  const facade = new QueryFacade({ lifecycle, events });
  return runDiagnostics({ config, lifecycle, facade, now: () => NOW });
}

describe('runDiagnostics', () => {
  it('reports a healthy native subsystem on the mock provider', async () => {
    const report = await diagnose({});

    expect(report.timestamp).toBe('2026-01-15T10:00:00.000Z');
    expect(report.checks.map((check) => [check.name, check.status, check.message])).toEqual([
      ['Configuration', 'WARNING', 'No AI provider configured; the mock agent will answer'],
      ['System Initialization', 'OK', 'Native subsystem ready (Scripted Agent)'],
      ['Token Analysis', 'OK', 'Answered with confidence 0.9'],
      ['General Query', 'OK', 'Answered with confidence 0.9'],
    ]);
    expect(report.overallStatus).toBe('WARNING');
    expect(report.summary).toEqual({ total: 4, ok: 3, warnings: 1, errors: 0 });
  });

  it('reports the fallback when the native library is missing', async () => {
    const report = await diagnose({}, () => {
      throw new Error('libfiqh.so not found');
    });

    expect(report.checks[1]).toEqual({
      name: 'System Initialization',
      status: 'ERROR',
      message: 'Native boundary unavailable: library failed to load: libfiqh.so not found',
    });
    expect(report.checks[2]?.status).toBe('WARNING');
    expect(report.checks[2]?.message).toBe('Answered from the offline fallback');
    expect(report.overallStatus).toBe('ERROR');
  });

  it('masks API keys in an invalid configuration', async () => {
    const report = await diagnose({ preferredProvider: 'groq', apiKeys: { openai: 'test-secret' } });

    expect(report.checks[0]).toMatchObject({
      name: 'Configuration',
      status: 'ERROR',
      details: {
        apiKeys: { openai: 'test… (11 chars)' },
        issues: ['apiKeys.groq: API key required for preferred provider "groq"'],
      },
    });
    expect(report.checks[1]?.message).toBe('Invalid advisor configuration: validation failed');
  });

  it('reports a keyed provider as OK', async () => {
    const report = await diagnose({ preferredProvider: 'openai', apiKeys: { openai: 'test-secret' } });

    expect(report.checks[0]?.status).toBe('OK');
    expect(report.checks[0]?.message).toBe('Preferred provider: openai');
  });
});

describe('summarizeChecks', () => {
  it('is OK only when every check is OK', () => {
    expect(summarizeChecks([]).overallStatus).toBe('OK');
    expect(
      summarizeChecks([
        { name: 'a', status: 'OK', message: '' },
        { name: 'b', status: 'OK', message: '' },
      ])
    ).toEqual({ overallStatus: 'OK', summary: { total: 2, ok: 2, warnings: 0, errors: 0 } });
  });
});
