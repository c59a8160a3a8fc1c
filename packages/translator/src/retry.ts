/**
 * Retry engine for provider calls.
 *
 * Wraps a single-attempt gateway: a failed attempt is retried with a
 * backoff until the policy runs out of attempts. Errors flagged as
 * non-retryable (bad request, auth) stop the loop at once.
 *
 * Retry knows nothing about caching or annotations.
 */

import type { ProviderGateway, ProviderRequest, ProviderTranslation } from "./types.js";

export const MAX_BACKOFF_MS = 10_000;

export interface RetryPolicy {
  /** Total attempts, first call included */
  maxAttempts: number;
  /** Delay before attempt `attempt + 1`, given the attempt that just failed */
  backoffMs: (attempt: number) => number;
}

/** Linear 500 ms × attempt, capped */
export function linearBackoff(attempt: number): number {
  return Math.min(500 * attempt, MAX_BACKOFF_MS);
}

export function retryPolicy(maxRetries: number, backoffMs: (attempt: number) => number = linearBackoff): RetryPolicy {
  return { maxAttempts: Math.max(0, Math.floor(maxRetries)) + 1, backoffMs };
}

/** Anything not explicitly marked `retryable: false` is worth another try */
export function isRetryable(err: unknown): boolean {
  if (typeof err === "object" && err !== null && "retryable" in err) {
    return err.retryable !== false;
  }
  return true;
}

export interface RetryHooks {
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run `attemptFn` until it resolves, a non-retryable error is thrown, or the
 * policy's attempts are spent. The last error is rethrown.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  attemptFn: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {}
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  let lastError: unknown = new Error("Retry policy allows no attempts");

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await attemptFn(attempt);
    } catch (err) {
      lastError = err;
      if (!isRetryable(err) || attempt === policy.maxAttempts) break;

      const delayMs = policy.backoffMs(attempt);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      if (delayMs > 0) await sleep(delayMs);
    }
  }

  throw lastError;
}

/** Gateway decorator applying a retry policy to every call */
export class RetryingGateway implements ProviderGateway {
  constructor(
    private readonly inner: ProviderGateway,
    private readonly policy: RetryPolicy,
    private readonly hooks: RetryHooks = {}
  ) {}

  translate(request: ProviderRequest): Promise<ProviderTranslation> {
    return withRetry(this.policy, () => this.inner.translate(request), this.hooks);
  }
}
