/**
 * @fileoverview Advisor error hierarchy
 *
 * Every failure that crosses the bridge is an AdvisorError subclass, and is
 * reduced to a plain ErrorInfo record before it reaches presentation code.
 */

// ============================================================================
// ERROR INFO
// ============================================================================

export type AdvisorErrorCode =
  | 'NATIVE_UNAVAILABLE'
  | 'INIT_TIMEOUT'
  | 'INIT_CONFIG_INVALID'
  | 'CALL_TIMEOUT'
  | 'CALL_CANCELLED'
  | 'NATIVE_REPORTED'
  | 'PROTOCOL_VIOLATION'
  | 'NOT_INITIALIZED'
  | 'INVALID_QUERY';

export interface ErrorInfo {
  readonly code: AdvisorErrorCode;
  readonly message: string;
  readonly retryable: boolean;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ErrorJSON extends ErrorInfo {
  timestamp: number;
  stack?: string;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class AdvisorError extends Error {
  abstract readonly code: AdvisorErrorCode;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  protected details(): Record<string, unknown> | undefined {
    return undefined;
  }

  toInfo(): ErrorInfo {
    const details = this.details();
    return details
      ? { code: this.code, message: this.message, retryable: this.retryable, details }
      : { code: this.code, message: this.message, retryable: this.retryable };
  }

  toJSON(): ErrorJSON {
    return {
      ...this.toInfo(),
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// LIFECYCLE ERRORS
// ============================================================================

export class NativeUnavailableError extends AdvisorError {
  readonly code = 'NATIVE_UNAVAILABLE';
  readonly retryable = false;

  constructor(
    readonly diagnostic: string,
    readonly missing: readonly string[] = [],
  ) {
    super(`Native boundary unavailable: ${diagnostic}`);
    this.name = 'NativeUnavailableError';
  }

  protected details(): Record<string, unknown> {
    return { missing: [...this.missing] };
  }
}

/** Recorded as the degraded reason; never thrown to callers. */
export class InitTimeoutError extends AdvisorError {
  readonly code = 'INIT_TIMEOUT';
  readonly retryable = true;

  constructor(
    readonly timeoutMs: number,
    readonly attempt: 'primary' | 'minimal',
  ) {
    super(`Native construction (${attempt}) exceeded ${timeoutMs}ms`);
    this.name = 'InitTimeoutError';
  }

  protected details(): Record<string, unknown> {
    return { timeoutMs: this.timeoutMs, attempt: this.attempt };
  }
}

export class InitConfigInvalidError extends AdvisorError {
  readonly code = 'INIT_CONFIG_INVALID';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
    readonly nativeCode?: string,
  ) {
    super(`Invalid advisor configuration: ${message}`);
    this.name = 'InitConfigInvalidError';
  }

  protected details(): Record<string, unknown> {
    return this.nativeCode
      ? { issues: [...this.issues], nativeCode: this.nativeCode }
      : { issues: [...this.issues] };
  }
}

export class NotInitializedError extends AdvisorError {
  readonly code = 'NOT_INITIALIZED';
  readonly retryable = false;

  constructor(message = 'Advisor system is not initialized and no fallback is available') {
    super(message);
    this.name = 'NotInitializedError';
  }
}

// ============================================================================
// CALL ERRORS
// ============================================================================

export class CallTimeoutError extends AdvisorError {
  readonly code = 'CALL_TIMEOUT';
  readonly retryable = true;

  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`Native call ${operation} timed out after ${timeoutMs}ms`);
    this.name = 'CallTimeoutError';
  }

  protected details(): Record<string, unknown> {
    return { operation: this.operation, timeoutMs: this.timeoutMs };
  }
}

export class CallCancelledError extends AdvisorError {
  readonly code = 'CALL_CANCELLED';
  readonly retryable = false;

  constructor(
    readonly operation: string,
    readonly reason = 'cancelled',
  ) {
    super(`Native call ${operation} ${reason}`);
    this.name = 'CallCancelledError';
  }

  protected details(): Record<string, unknown> {
    return { operation: this.operation, reason: this.reason };
  }
}

export class NativeReportedError extends AdvisorError {
  readonly code = 'NATIVE_REPORTED';

  constructor(
    readonly nativeCode: string,
    message: string,
    readonly operation?: string,
    readonly retryable = false,
  ) {
    super(message);
    this.name = 'NativeReportedError';
  }

  protected details(): Record<string, unknown> {
    return this.operation
      ? { nativeCode: this.nativeCode, operation: this.operation }
      : { nativeCode: this.nativeCode };
  }
}

export class ProtocolViolationError extends AdvisorError {
  readonly code = 'PROTOCOL_VIOLATION';
  readonly retryable = false;

  constructor(
    readonly expectedSequence: number,
    readonly receivedSequence: number,
  ) {
    super(`Stream chunk out of sequence: expected ${expectedSequence}, got ${receivedSequence}`);
    this.name = 'ProtocolViolationError';
  }

  protected details(): Record<string, unknown> {
    return { expectedSequence: this.expectedSequence, receivedSequence: this.receivedSequence };
  }
}

export class InvalidQueryError extends AdvisorError {
  readonly code = 'INVALID_QUERY';
  readonly retryable = false;

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`Invalid query (${field}): ${message}`);
    this.name = 'InvalidQueryError';
  }

  protected details(): Record<string, unknown> {
    return { field: this.field };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isAdvisorError(error: unknown): error is AdvisorError {
  return error instanceof AdvisorError;
}

export function isErrorInfo(value: unknown): value is ErrorInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    typeof value.code === 'string' &&
    typeof value.message === 'string'
  );
}

/**
 * Normalize anything thrown or rejected into an ErrorInfo.
 * Unknown failures are reported as native errors with code `internal`.
 */
export function toErrorInfo(error: unknown, operation?: string): ErrorInfo {
  if (error instanceof AdvisorError) return error.toInfo();
  if (isErrorInfo(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new NativeReportedError('internal', message, operation).toInfo();
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  nativeUnavailable: (diagnostic: string, missing: readonly string[] = []) =>
    new NativeUnavailableError(diagnostic, missing),

  initTimeout: (timeoutMs: number, attempt: 'primary' | 'minimal') =>
    new InitTimeoutError(timeoutMs, attempt),

  configInvalid: (message: string, issues: readonly string[] = [], nativeCode?: string) =>
    new InitConfigInvalidError(message, issues, nativeCode),

  notInitialized: (message?: string) =>
    new NotInitializedError(message),

  callTimeout: (operation: string, timeoutMs: number) =>
    new CallTimeoutError(operation, timeoutMs),

  cancelled: (operation: string, reason?: string) =>
    new CallCancelledError(operation, reason),

  native: (nativeCode: string, message: string, operation?: string, retryable = false) =>
    new NativeReportedError(nativeCode, message, operation, retryable),

  protocol: (expected: number, received: number) =>
    new ProtocolViolationError(expected, received),

  invalidQuery: (field: string, message: string) =>
    new InvalidQueryError(field, message),
};
