import { afterEach, describe, expect, it, vi } from 'vitest';
import { AbortedError, Mutex, delay } from '../async.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('delay', () => {
  it('resolves after the given time', async () => {
    vi.useFakeTimers();
    let resolved = false;
    const waiting = delay(100).then(() => {
      resolved = true;
    });

    await vi.advanceTimersByTimeAsync(99);
    expect(resolved).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await waiting;
    expect(resolved).toBe(true);
  });

  it('rejects immediately on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(delay(1_000, controller.signal)).rejects.toBeInstanceOf(AbortedError);
  });

  it('rejects when the signal aborts while waiting', async () => {
    const controller = new AbortController();
    const waiting = delay(60_000, controller.signal);

    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(AbortedError);
  });
});

describe('Mutex', () => {
  it('runs critical sections one at a time in call order', async () => {
    const lock = new Mutex();
    const order: string[] = [];

    const first = lock.runExclusive(async () => {
      order.push('first:start');
      await Promise.resolve();
      await Promise.resolve();
      order.push('first:end');
    });
    const second = lock.runExclusive(() => {
      order.push('second');
    });

    expect(lock.isLocked).toBe(true);
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.isLocked).toBe(false);
  });

  it('keeps going after a section throws', async () => {
    const lock = new Mutex();

    const failing = lock.runExclusive(() => {
      throw new Error('section failed');
    });
    const next = lock.runExclusive(() => 'after');

    await expect(failing).rejects.toThrow('section failed');
    await expect(next).resolves.toBe('after');
  });
});
