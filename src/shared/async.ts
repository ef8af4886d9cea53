/**
 * Async utilities for retry, polling and cancellable sleep
 */

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  backoff?: number;
  maxDelayMs?: number;
  signal?: AbortSignal | undefined;
  /** Called before waiting for the next attempt */
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
}

/**
 * Raised by sleep/retry/poll when the signal aborts.
 */
export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Delay before attempt `attempt + 1`: delayMs * backoff^(attempt - 1), capped.
 */
export function backoffDelay(
  attempt: number,
  { delayMs = 1000, backoff = 2, maxDelayMs = 30_000 }: RetryOptions = {},
): number {
  return Math.min(delayMs * Math.pow(backoff, attempt - 1), maxDelayMs);
}

export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxAttempts = 3, signal, onRetry } = options;
  let last: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) throw new AbortedError();
    try {
      return await fn(attempt);
    } catch (err) {
      last = err;
      if (attempt === maxAttempts) break;
      const wait = backoffDelay(attempt, options);
      onRetry?.(err, attempt, wait);
      await sleep(wait, signal);
    }
  }
  throw last instanceof Error ? last : new Error(String(last));
}

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  signal?: AbortSignal | undefined;
}

export type PollOutcome<T> = { done: true; value: T } | { done: false; timedOut: true; last?: T };

/**
 * Call `check` until it returns a value `isDone` accepts or the timeout elapses.
 * Errors thrown by `check` propagate.
 */
export async function pollUntil<T>(
  check: () => Promise<T>,
  isDone: (value: T) => boolean,
  { intervalMs, timeoutMs, signal }: PollOptions,
): Promise<PollOutcome<T>> {
  const deadline = Date.now() + timeoutMs;
  let last: T | undefined;

  for (;;) {
    if (signal?.aborted) throw new AbortedError();
    last = await check();
    if (isDone(last)) {
      return { done: true, value: last };
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return { done: false, timedOut: true, last };
    }
    await sleep(Math.min(intervalMs, remaining), signal);
  }
}
