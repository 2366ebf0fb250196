import { WaitTimeoutError } from './errors.js';

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
  /** Used in the timeout message. */
  description?: string;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export const delay = (ms: number): Promise<void> => new Promise((r) => setTimeout(r, ms));

/**
 * Poll `predicate` until it resolves true. A predicate that throws counts as
 * "not ready yet" (the page may still be navigating). Rejects with
 * WaitTimeoutError once `timeoutMs` has elapsed, or with the signal's reason
 * when aborted.
 */
export async function waitFor(
  predicate: () => Promise<boolean>,
  options: WaitOptions,
): Promise<void> {
  const sleep = options.sleep ?? delay;
  const now = options.now ?? Date.now;
  const deadline = now() + options.timeoutMs;

  for (;;) {
    options.signal?.throwIfAborted();

    let ready = false;
    try {
      ready = await predicate();
    } catch {
      ready = false;
    }
    if (ready) return;

    const remaining = deadline - now();
    if (remaining <= 0) {
      throw new WaitTimeoutError(options.description ?? 'condition', options.timeoutMs);
    }
    await sleep(Math.min(options.intervalMs, remaining));
  }
}
