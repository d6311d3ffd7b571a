import type { ReconnectPolicy } from './types.js';

/**
 * Delay before reconnect attempt `attempt` (1-based)
 *
 * min(max, base * 2^(attempt-1)), stretched upward by up to `jitterRatio`.
 * With jitterRatio < 1 each delay below the cap is strictly larger than the
 * one before it.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: ReconnectPolicy,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, policy.maxDelayMs);
  return Math.round(capped * (1 + policy.jitterRatio * random()));
}

/**
 * Resolve true after `ms`, or false as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
