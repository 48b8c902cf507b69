import { parseArgs } from 'node:util';
import type { ErrorInfo } from '../../core/errors.js';
import { Err, Ok, type Result } from '../../core/result.js';
import type { QueryRequest, QueryResponse } from '../../types.js';
import {
  COMMON_OPTIONS,
  initializeForQueries,
  parseTimeout,
  withAdvisor,
  type CommandOptions,
} from '../context.js';
import { createError, fromErrorInfo } from '../errors.js';
import { formatKeyValue, formatPercent } from '../progress.js';

/**
 * Tracks what has been written so far and returns only the new part of each
 * cumulative update. A completion text that does not extend the streamed
 * text is printed whole on a new line.
 */
export class StreamPrinter {
  private printed = '';

  next(cumulativeText: string): string {
    if (!cumulativeText.startsWith(this.printed)) {
      this.printed = cumulativeText;
      return `\n${cumulativeText}`;
    }
    const delta = cumulativeText.slice(this.printed.length);
    this.printed = cumulativeText;
    return delta;
  }
}

export async function chatCommand(options: CommandOptions): Promise<void> {
  const { values, positionals } = parseArgs({
    args: options.rawArgs.slice(1),
    options: COMMON_OPTIONS,
    allowPositionals: true,
    strict: true,
  });

  const message = positionals.join(' ').trim();
  if (!message) {
    throw createError('INVALID_ARGUMENT', 'Message is required. Usage: fiqh-advisor chat "<message>"');
  }
  const request: QueryRequest = {
    kind: 'chat_message',
    payload: message,
    language: values.language ?? 'en',
    conversationId: `cli:${values.user ?? 'anonymous'}`,
    ...(values.user ? { userId: values.user } : {}),
  };

  await withAdvisor(options, parseTimeout(values.timeout), async (session) => {
    await initializeForQueries(session);
    const printer = new StreamPrinter();
    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort('interrupted');
    process.once('SIGINT', onInterrupt);

    let outcome: Result<QueryResponse, ErrorInfo>;
    try {
      outcome = await new Promise<Result<QueryResponse, ErrorInfo>>((resolve) => {
        session.advisor.facade.analyzeStream(
          request,
          {
            onChunk: (text) => {
              if (!values.json) process.stdout.write(printer.next(text));
            },
            onComplete: (response) => resolve(Ok(response)),
            onError: (error) => resolve(Err(error)),
          },
          { signal: controller.signal }
        );
      });
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }

    if (!outcome.ok) {
      if (!values.json) process.stdout.write('\n');
      throw fromErrorInfo(outcome.error);
    }
    const response = outcome.value;
    if (values.json) {
      console.log(JSON.stringify(response, null, 2));
      return;
    }
    process.stdout.write(`${printer.next(response.text)}\n\n`);
    for (const line of formatKeyValue([
      { key: 'Confidence', value: formatPercent(response.confidence) },
      { key: 'Sources', value: response.sources.join(', ') },
    ])) {
      console.log(line);
    }
  });
}
