import { describe, it, expect, vi } from 'vitest';
import { CancelledError } from '../errors.js';
import { abortableSleep, withRetry } from './retry.js';

function recorder() {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => { delays.push(ms); } };
}

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const { delays, sleep } = recorder();
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 2) throw new Error('flaky');
      return 'ok';
    });

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 2000, sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(delays).toEqual([2000]);
  });

  it('doubles the delay and rethrows the last error when attempts run out', async () => {
    const { delays, sleep } = recorder();
    let calls = 0;
    const fn = async () => {
      calls += 1;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 2000, sleep })).rejects.toThrow('failure 3');
    expect(delays).toEqual([2000, 4000]);
  });

  it('reports each retry to onRetry', async () => {
    const { sleep } = recorder();
    const onRetry = vi.fn();
    await withRetry(async () => { throw new Error('x'); }, { maxAttempts: 2, baseDelayMs: 10, sleep, onRetry })
      .catch(() => undefined);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[0]).toBe(1);
    expect(onRetry.mock.calls[0]?.[1]).toBe(10);
  });

  it('throws CancelledError before the first attempt when cancelled', async () => {
    const fn = vi.fn(async () => 'never');
    await expect(withRetry(fn, { maxAttempts: 3, isCancelled: () => true })).rejects.toBeInstanceOf(CancelledError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('checks cancellation again after a backoff', async () => {
    let cancelled = false;
    const { delays, sleep } = recorder();
    const fn = vi.fn(async () => {
      cancelled = true;
      throw new Error('down');
    });

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 2000, sleep, isCancelled: () => cancelled }))
      .rejects.toBeInstanceOf(CancelledError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([2000]);
  });
});

describe('abortableSleep', () => {
  it('returns early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = abortableSleep(60_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it('returns at once for an already aborted signal', async () => {
    await expect(abortableSleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
