import { describe, expect, it } from 'vitest';
import { ScriptedBoundary } from '../../__tests__/helpers/index.js';
import { isNativeBoundary, loadNativeBoundary, missingEntryPoints } from '../loader.js';

describe('loadNativeBoundary', () => {
  it('returns a verified boundary', async () => {
    const boundary = new ScriptedBoundary();

    const result = await loadNativeBoundary(() => boundary);

    expect(result).toEqual({ ok: true, value: boundary });
  });

  it('reports a loader that throws as unavailable', async () => {
    const result = await loadNativeBoundary(() => {
      throw new Error('libfiqh.so: cannot open shared object file');
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('NATIVE_UNAVAILABLE');
      expect(result.error.message).toBe(
        'Native boundary unavailable: library failed to load: libfiqh.so: cannot open shared object file'
      );
    }
  });

  it('lists missing entry points', async () => {
    const partial = { contractVersion: 1, construct: () => undefined, poll: () => 'pending' };

    const result = await loadNativeBoundary(async () => {
      if (isNativeBoundary(partial)) return partial;
      throw new Error(`incomplete: ${missingEntryPoints(partial).join(',')}`);
    });

    expect(missingEntryPoints(partial)).toEqual(['invoke', 'invokeStreaming', 'complete', 'cancel', 'free', 'destroy']);
    expect(result.ok).toBe(false);
  });

  it('rejects another contract version', async () => {
    const result = await loadNativeBoundary(() => new ScriptedBoundary({ contractVersion: 2 }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Native boundary unavailable: contract version 2 is not supported (expected 1)');
    }
  });

  it('treats non-objects as missing every entry point', () => {
    expect(missingEntryPoints(null)).toHaveLength(8);
    expect(isNativeBoundary('boundary')).toBe(false);
  });
});
