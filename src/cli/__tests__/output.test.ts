import { describe, expect, it } from 'vitest';
import { createAdvisor } from '../../advisor.js';
import type { QueryResponse } from '../../types.js';
import { ScriptedBoundary } from '../../__tests__/helpers/index.js';
import { formatResponse } from '../commands/analyze.js';
import { StreamPrinter } from '../commands/chat.js';
import { formatDiagnosticsReport } from '../commands/diagnose.js';
import { initializeForQueries, parseQueryKind, parseTimeout, withAdvisor } from '../context.js';
import { getHelpText } from '../help.js';
import { formatDuration, formatKeyValue, formatPercent } from '../progress.js';

describe('progress formatting', () => {
  it('formats durations by magnitude', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125_000)).toBe('2m 5s');
  });

  it('formats confidence as a percentage', () => {
    expect(formatPercent(0.6)).toBe('60%');
  });

  it('pads keys to the longest one', () => {
    expect(formatKeyValue([{ key: 'Agent', value: 'Mock' }, { key: 'Vector search', value: null }])).toEqual([
      '  Agent        : Mock',
      '  Vector search: N/A',
    ]);
  });
});

describe('argument parsing', () => {
  it('accepts positive integer timeouts', () => {
    expect(parseTimeout(undefined)).toBeUndefined();
    expect(parseTimeout('500')).toBe(500);
  });

  it('rejects malformed timeouts', () => {
    expect(() => parseTimeout('0')).toThrow('--timeout must be a positive number of milliseconds (got "0")');
    expect(() => parseTimeout('10ms')).toThrow('(got "10ms")');
  });

  it('accepts only known query kinds', () => {
    expect(parseQueryKind('contract')).toBe('contract');
    expect(() => parseQueryKind('video')).toThrow(
      'Query kind must be one of token, text, contract, audio, chat_message (got "video")'
    );
  });
});

describe('formatResponse', () => {
  const response: QueryResponse = {
    id: 'r-1',
    text: 'Staking rewards are permissible under conditions.',
    confidence: 0.85,
    sources: ['native', 'AAOIFI'],
    followUps: ['What conditions apply?'],
    createdAt: 0,
    analysisId: 'a-1',
  };

  it('lists the answer, metadata and follow-ups', () => {
    expect(formatResponse(response, 1500)).toEqual([
      'Staking rewards are permissible under conditions.',
      '',
      '  Confidence : 85%',
      '  Sources    : native, AAOIFI',
      '  Response ID: r-1',
      '  Analysis ID: a-1',
      '  Took       : 1.5s',
      '',
      'Follow-up questions:',
      '  - What conditions apply?',
    ]);
  });

  it('omits optional rows', () => {
    const lines = formatResponse({ ...response, analysisId: undefined, followUps: [] });
    expect(lines).toEqual([
      'Staking rewards are permissible under conditions.',
      '',
      '  Confidence : 85%',
      '  Sources    : native, AAOIFI',
      '  Response ID: r-1',
    ]);
  });
});

describe('StreamPrinter', () => {
  it('prints only the new part of cumulative text', () => {
    const printer = new StreamPrinter();

    expect(printer.next('Ri')).toBe('Ri');
    expect(printer.next('Riba is')).toBe('ba is');
    expect(printer.next('Riba is')).toBe('');
  });

  it('reprints a diverging completion on a new line', () => {
    const printer = new StreamPrinter();
    printer.next('Draft');

    expect(printer.next('Final answer')).toBe('\nFinal answer');
  });
});

describe('formatDiagnosticsReport', () => {
  const report = {
    timestamp: '2026-01-01T00:00:00.000Z',
    overallStatus: 'WARNING' as const,
    checks: [
      { name: 'Configuration', status: 'OK' as const, message: 'Provider: groq', details: { keys: ['groq'], provider: 'groq' } },
      { name: 'Token Analysis', status: 'WARNING' as const, message: 'Low confidence', suggestion: 'Set GROQ_API_KEY' },
    ],
    summary: { total: 2, ok: 1, warnings: 1, errors: 0 },
  };

  it('renders checks, details and the summary', () => {
    expect(formatDiagnosticsReport(report, true)).toEqual([
      'Fiqh Advisor Diagnostics',
      '========================',
      '',
      'Timestamp: 2026-01-01T00:00:00.000Z',
      '',
      '[OK] Configuration',
      '       Provider: groq',
      '       Details:',
      '         keys: ["groq"]',
      '         provider: groq',
      '',
      '[WARN] Token Analysis',
      '       Low confidence',
      '       Suggestion: Set GROQ_API_KEY',
      '',
      'Summary:',
      '  Total checks: 2',
      '  OK: 1',
      '  Warnings: 1',
      '  Errors: 0',
      '',
      'Overall Status: [WARN] WARNING',
    ]);
  });

  it('hides details unless verbose', () => {
    expect(formatDiagnosticsReport(report, false)).not.toContain('       Details:');
  });
});

describe('help', () => {
  it('returns command help or the main text', () => {
    expect(getHelpText('chat')).toContain('fiqh-advisor chat - Ask a question and stream the answer');
    expect(getHelpText('unknown')).toBe(getHelpText());
  });
});

describe('withAdvisor', () => {
  it('reports an unknown provider as a configuration error', async () => {
    await expect(
      withAdvisor({ rawArgs: [], env: { FIQH_ADVISOR_PROVIDER: 'bogus' } }, undefined, async () => 1)
    ).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
  });

  it('initializes from the environment and always shuts down', async () => {
    const boundary = new ScriptedBoundary();
    const states: string[] = [];

    await expect(
      withAdvisor(
        {
          rawArgs: [],
          env: { GROQ_API_KEY: 'test-secret' },
          advisorFactory: (options) => createAdvisor({ ...options, loader: () => boundary }),
        },
        5000,
        async (session) => {
          expect(session.config.preferredProvider).toBe('groq');
          states.push((await initializeForQueries(session)).status);
          throw new Error('command failed');
        }
      )
    ).rejects.toThrow('command failed');

    expect(states).toEqual(['ready']);
    expect(boundary.destroyed).toEqual([1]);
  });
});
