import { setTimeout as delay } from 'timers/promises';
import { logger } from './logger.js';
import { CancelledError } from '../errors.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Sleeps for `ms`, returning early (without throwing) when `signal` aborts. */
export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
};

interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  isCancelled?: () => boolean;
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void;
}

/**
 * Runs `fn` until it resolves or `maxAttempts` is reached. Attempt `n` waits
 * `baseDelayMs * backoffFactor^(n-1)` before the next one. Cancellation is
 * checked at the top of every attempt and throws `CancelledError`.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs = 1_000, backoffFactor = 2,
    isCancelled = () => false, signal, sleep = abortableSleep, onRetry } = opts;
  let lastErr: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (isCancelled()) throw new CancelledError();
    try { return await fn(attempt); }
    catch (err) {
      lastErr = err;
      if (attempt === maxAttempts) break;
      const delayMs = baseDelayMs * Math.pow(backoffFactor, attempt - 1);
      logger.warn(`Retry ${attempt}/${maxAttempts} in ${delayMs}ms`, { error: String(err) });
      onRetry?.(attempt, delayMs, err);
      await sleep(delayMs, signal);
    }
  }
  throw lastErr;
}
