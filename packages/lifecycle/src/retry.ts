import type { RetryPolicy } from "./config.js";
import type { LifecycleError } from "./errors.js";
import type { Result } from "./result.js";

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryObserver<E> {
  onRetry?(error: E, attempt: number, delayMs: number): void;
}

/**
 * Calls `fn` until it succeeds, fails with a non-retryable error, or the
 * attempts run out. Delays double from `initialDelayMs` up to `maxDelayMs`.
 * Returns the last result together with the number of attempts made.
 */
export async function retryTransient<T, E extends LifecycleError>(
  fn: (attempt: number) => Promise<Result<T, E>>,
  policy: RetryPolicy,
  sleep: Sleep = realSleep,
  observer: RetryObserver<E> = {},
): Promise<{ result: Result<T, E>; attempts: number }> {
  let delay = policy.initialDelayMs;
  let attempt = 1;

  for (;;) {
    const result = await fn(attempt);
    if (result.ok || !result.error.retryable || attempt >= policy.maxAttempts) {
      return { result, attempts: attempt };
    }

    observer.onRetry?.(result.error, attempt, delay);
    if (delay > 0) await sleep(delay);
    delay = Math.min(delay * 2, policy.maxDelayMs);
    attempt += 1;
  }
}

/**
 * Races `promise` against a timer. On timeout the caller's `onTimeout` value
 * wins; the underlying call is not cancelled, so it must be idempotent.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => T,
): Promise<T> {
  if (timeoutMs <= 0) return promise;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(onTimeout()), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
