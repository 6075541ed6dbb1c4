import { EmptyCompletionError, LlmRequestError, RetryExhaustedError, ScoreParseError } from '../errors.js';
import { sleep as realSleep } from '../sleep.js';
import type { RetryConfig } from '../types.js';

export type RetryPolicy = RetryConfig;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  jitter: true,
};

export interface RetryHooks {
  /** Called before waiting for the next attempt. */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  /** Called once with the number of the last attempt, whichever error ends the loop. */
  onGiveUp?: (info: { attempt: number; error: unknown }) => void;
  isRetryable?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof LlmRequestError) return error.retryable;
  return error instanceof ScoreParseError || error instanceof EmptyCompletionError;
}

/** Exponential backoff; attempt is the 1-based number of the attempt that just failed. */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const base = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  if (!policy.jitter) return base;
  return Math.min(policy.maxDelayMs, Math.floor(base * (0.75 + random() * 0.75)));
}

function retryAfterHint(error: unknown): number {
  return error instanceof LlmRequestError && error.retryAfterMs !== undefined ? error.retryAfterMs : 0;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<T> {
  const { onRetry, onGiveUp, isRetryable: retryable = isRetryable, sleep = realSleep, random = Math.random } = hooks;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      const canRetry = retryable(err);
      if (!canRetry || attempt >= maxAttempts) {
        onGiveUp?.({ attempt, error: err });
        if (!canRetry) throw err;
        throw new RetryExhaustedError(attempt, err);
      }

      const delayMs = Math.min(policy.maxDelayMs, Math.max(backoffDelay(policy, attempt, random), retryAfterHint(err)));
      onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs);
    }
  }
}
