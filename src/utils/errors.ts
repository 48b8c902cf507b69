/**
 * @fileoverview Error Utilities
 * Re-exports from core/errors.ts plus message helpers.
 */

export * from '../core/errors.js';

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

/**
 * Mask a secret for display: keeps a short prefix and the length.
 */
export function maskSecret(secret: string, visible = 4): string {
  if (secret.length === 0) return '(empty)';
  if (secret.length <= visible) return '*'.repeat(secret.length);
  return `${secret.slice(0, visible)}… (${secret.length} chars)`;
}
