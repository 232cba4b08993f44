import type { RetryPolicy } from "../../src/lib/source-config";
import { isTransientError } from "./errors";

export type RetryOptions = RetryPolicy & {
  signal?: AbortSignal;
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number; waitMs: number }
  | { ok: false; error: unknown; attempts: number; waitMs: number };

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Delay after the failed attempt `attempt` (0-based): `baseDelayMs * 2^attempt` plus up to 25%
 * random jitter, capped at `maxDelayMs`.
 */
export function backoffDelayMs(attempt: number, policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs">): number {
  const base = Math.max(0, policy.baseDelayMs);
  const exp = Math.min(policy.maxDelayMs, base * 2 ** Math.max(0, attempt));
  const jitter = Math.floor(Math.random() * exp * 0.25);
  return Math.max(0, Math.min(policy.maxDelayMs, exp + jitter));
}

/**
 * Runs `task` until it resolves, fails with an error `shouldRetry` rejects, or `maxRetries` extra
 * attempts are used up. Cancellation of `signal` is rethrown instead of being reported as a failure.
 */
export async function retryWithBackoff<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const maxRetries = Math.max(0, Math.floor(options.maxRetries));
  let waitMs = 0;

  for (let attempt = 0; ; attempt += 1) {
    options.signal?.throwIfAborted();
    try {
      const value = await task(attempt);
      return { ok: true, value, attempts: attempt + 1, waitMs };
    } catch (err) {
      options.signal?.throwIfAborted();
      if (attempt >= maxRetries || !shouldRetry(err)) {
        return { ok: false, error: err, attempts: attempt + 1, waitMs };
      }
      const delayMs = backoffDelayMs(attempt, options);
      options.onRetry?.({ attempt: attempt + 1, delayMs, error: err });
      await sleep(delayMs, options.signal);
      waitMs += delayMs;
    }
  }
}
