/**
 * @fileoverview Core advisor infrastructure
 *
 * Result types and the error hierarchy used throughout the bridge.
 */

// Result types
export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
} from './result.js';

// Error types
export {
  type AdvisorErrorCode,
  type ErrorInfo,
  type ErrorJSON,
  AdvisorError,
  NativeUnavailableError,
  InitTimeoutError,
  InitConfigInvalidError,
  NotInitializedError,
  CallTimeoutError,
  CallCancelledError,
  NativeReportedError,
  ProtocolViolationError,
  InvalidQueryError,
  isAdvisorError,
  isErrorInfo,
  toErrorInfo,
  Errors,
} from './errors.js';
