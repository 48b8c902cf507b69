import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import type { QueryKind, QueryRequest, QueryResponse } from '../../types.js';
import { getErrorMessage } from '../../utils/errors.js';
import {
  COMMON_OPTIONS,
  initializeForQueries,
  parseQueryKind,
  parseTimeout,
  withAdvisor,
  type CommandOptions,
} from '../context.js';
import { createError, fromErrorInfo } from '../errors.js';
import { createSpinner, formatDuration, formatKeyValue, formatPercent } from '../progress.js';

/** Audio payloads are read from the named file. */
async function readPayload(kind: QueryKind, positionals: string[]): Promise<string | Uint8Array> {
  if (kind !== 'audio') return positionals.join(' ');
  const file = positionals[0];
  if (!file) {
    throw createError('INVALID_ARGUMENT', 'Audio analysis needs a file path. Usage: fiqh-advisor analyze audio <file>');
  }
  try {
    return await readFile(file);
  } catch (error) {
    throw createError('INVALID_ARGUMENT', `Cannot read audio file ${file}: ${getErrorMessage(error)}`);
  }
}

export function formatResponse(response: QueryResponse, durationMs?: number): string[] {
  const lines = [response.text, ''];
  lines.push(
    ...formatKeyValue([
      { key: 'Confidence', value: formatPercent(response.confidence) },
      { key: 'Sources', value: response.sources.join(', ') },
      { key: 'Response ID', value: response.id },
      ...(response.analysisId ? [{ key: 'Analysis ID', value: response.analysisId }] : []),
      ...(durationMs !== undefined ? [{ key: 'Took', value: formatDuration(durationMs) }] : []),
    ])
  );
  if (response.followUps.length > 0) {
    lines.push('', 'Follow-up questions:', ...response.followUps.map((question) => `  - ${question}`));
  }
  return lines;
}

export async function analyzeCommand(options: CommandOptions): Promise<void> {
  const { values, positionals } = parseArgs({
    args: options.rawArgs.slice(1),
    options: COMMON_OPTIONS,
    allowPositionals: true,
    strict: true,
  });

  const [kindArg, ...rest] = positionals;
  const kind = parseQueryKind(kindArg);
  const payload = await readPayload(kind, rest);
  if (typeof payload === 'string' && payload.trim() === '') {
    throw createError('INVALID_ARGUMENT', 'Nothing to analyze. Usage: fiqh-advisor analyze <kind> <text>');
  }
  const request: QueryRequest = {
    kind,
    payload,
    language: values.language ?? 'en',
    ...(values.user ? { userId: values.user } : {}),
  };

  await withAdvisor(options, parseTimeout(values.timeout), async (session) => {
    await initializeForQueries(session);
    const spinner = values.json ? null : createSpinner(`Analyzing ${kind}...`);
    const started = Date.now();
    const result = await session.advisor.facade.analyze(request);
    spinner?.stop();
    if (!result.ok) throw fromErrorInfo(result.error);

    if (values.json) {
      console.log(JSON.stringify(result.value, null, 2));
      return;
    }
    for (const line of formatResponse(result.value, values.verbose === true ? Date.now() - started : undefined)) {
      console.log(line);
    }
  });
}
