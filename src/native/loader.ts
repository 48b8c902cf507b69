/**
 * @fileoverview Native boundary loading and verification.
 *
 * Loading is the first step of initialization: a boundary that cannot be
 * loaded, lacks an entry point, or speaks another contract version is fatal.
 */

import { Errors, type NativeUnavailableError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { getErrorMessage } from '../utils/errors.js';
import { NATIVE_CONTRACT_VERSION, type NativeBoundary, type NativeBoundaryLoader } from './types.js';

const REQUIRED_FUNCTIONS = [
  'construct',
  'invoke',
  'invokeStreaming',
  'poll',
  'complete',
  'cancel',
  'free',
  'destroy',
] as const;

function hasFunction(value: object, key: string): boolean {
  return typeof Reflect.get(value, key) === 'function';
}

/** Names of required entry points the candidate does not provide. */
export function missingEntryPoints(candidate: unknown): string[] {
  if (typeof candidate !== 'object' || candidate === null) {
    return [...REQUIRED_FUNCTIONS];
  }
  return REQUIRED_FUNCTIONS.filter((name) => !hasFunction(candidate, name));
}

export function isNativeBoundary(candidate: unknown): candidate is NativeBoundary {
  return (
    missingEntryPoints(candidate).length === 0 &&
    typeof candidate === 'object' &&
    candidate !== null &&
    typeof Reflect.get(candidate, 'contractVersion') === 'number'
  );
}

/**
 * Run the loader and verify what it returns is callable.
 */
export async function loadNativeBoundary(
  loader: NativeBoundaryLoader
): Promise<Result<NativeBoundary, NativeUnavailableError>> {
  let candidate: unknown;
  try {
    candidate = await loader();
  } catch (error) {
    return Err(Errors.nativeUnavailable(`library failed to load: ${getErrorMessage(error)}`));
  }

  const missing = missingEntryPoints(candidate);
  if (missing.length > 0) {
    return Err(Errors.nativeUnavailable(`missing entry points: ${missing.join(', ')}`, missing));
  }
  if (!isNativeBoundary(candidate)) {
    return Err(Errors.nativeUnavailable('contractVersion is not declared'));
  }
  if (candidate.contractVersion !== NATIVE_CONTRACT_VERSION) {
    return Err(
      Errors.nativeUnavailable(
        `contract version ${candidate.contractVersion} is not supported (expected ${NATIVE_CONTRACT_VERSION})`
      )
    );
  }
  return Ok(candidate);
}
