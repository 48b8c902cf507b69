/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isAdvisorError, isErrorInfo, type AdvisorErrorCode, type ErrorInfo } from '../core/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIG_INVALID'
  | 'NATIVE_UNAVAILABLE'
  | 'QUERY_FAILED'
  | 'TIMEOUT'
  | 'CANCELLED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `fiqh-advisor help <command>` for usage information.',
  CONFIG_INVALID: 'Check FIQH_ADVISOR_PROVIDER and the matching API key variable.',
  NATIVE_UNAVAILABLE: 'Run `fiqh-advisor diagnose` to see why the native subsystem did not load.',
  QUERY_FAILED: 'Try again, or run `fiqh-advisor status` to check the backend.',
  TIMEOUT: 'The operation timed out. Try again or increase the timeout with --timeout.',
  CANCELLED: 'The request was cancelled before it finished.',
};

export const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  CONFIG_INVALID: 3,
  NATIVE_UNAVAILABLE: 4,
  QUERY_FAILED: 5,
  TIMEOUT: 6,
  CANCELLED: 130,
};

const ADVISOR_CODE_MAP: Record<AdvisorErrorCode, CliErrorCode> = {
  NATIVE_UNAVAILABLE: 'NATIVE_UNAVAILABLE',
  INIT_TIMEOUT: 'TIMEOUT',
  INIT_CONFIG_INVALID: 'CONFIG_INVALID',
  CALL_TIMEOUT: 'TIMEOUT',
  CALL_CANCELLED: 'CANCELLED',
  NATIVE_REPORTED: 'QUERY_FAILED',
  PROTOCOL_VIOLATION: 'QUERY_FAILED',
  NOT_INITIALIZED: 'NATIVE_UNAVAILABLE',
  INVALID_QUERY: 'INVALID_ARGUMENT',
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/** CLI error for an advisor failure, keeping the advisor code in details. */
export function fromErrorInfo(info: ErrorInfo): CliError {
  const code: CliErrorCode | undefined = ADVISOR_CODE_MAP[info.code];
  return createError(code ?? 'QUERY_FAILED', info.message, { advisorCode: info.code });
}

/** Errors thrown by `util.parseArgs` for unknown or malformed flags. */
function isArgumentError(error: unknown): error is Error {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (isAdvisorError(error)) return fromErrorInfo(error.toInfo());
  if (isErrorInfo(error)) return fromErrorInfo(error);
  if (isArgumentError(error)) return createError('INVALID_ARGUMENT', error.message);
  return createError('QUERY_FAILED', error instanceof Error ? error.message : String(error));
}

export function getExitCode(error: CliError): number {
  return EXIT_CODES[error.code];
}

export function formatError(error: unknown): string {
  const cliError = toCliError(error);
  const line = `Error [${cliError.code}]: ${cliError.message}`;
  return cliError.suggestion ? `${line}\n\nSuggestion: ${cliError.suggestion}` : line;
}

export function formatErrorJson(error: unknown): string {
  const cliError = toCliError(error);
  return JSON.stringify(
    {
      error: {
        code: cliError.code,
        message: cliError.message,
        ...(cliError.suggestion ? { suggestion: cliError.suggestion } : {}),
        ...(cliError.details ? { details: cliError.details } : {}),
      },
    },
    null,
    2,
  );
}
