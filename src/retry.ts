/**
 * Retry with exponential backoff around the description call.
 * The policy is a pure step function over a small state record so it can be
 * tested without timers; `withRetry` is the loop that drives it.
 */

import { setTimeout as delay } from "node:timers/promises";
import { CancelledError, RateLimitedError, isRetryable } from "./errors.js";

export interface RetryPolicy {
  /** retries after the first attempt */
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface RetryState {
  /** attempts made so far */
  readonly attempt: number;
  readonly nextDelayMs: number;
}

export type RetryStep =
  | { readonly kind: "retry"; readonly delayMs: number; readonly state: RetryState }
  | { readonly kind: "give-up"; readonly reason: "permanent" | "exhausted" };

export function initialRetryState(policy: RetryPolicy): RetryState {
  return { attempt: 1, nextDelayMs: Math.min(policy.baseDelayMs, policy.maxDelayMs) };
}

/** Decide what follows a failed attempt. */
export function nextRetryStep(state: RetryState, err: unknown, policy: RetryPolicy): RetryStep {
  if (!isRetryable(err)) return { kind: "give-up", reason: "permanent" };
  if (state.attempt > policy.maxRetries) return { kind: "give-up", reason: "exhausted" };

  let delayMs = state.nextDelayMs;
  if (err instanceof RateLimitedError && err.retryAfterMs !== undefined) {
    delayMs = Math.min(Math.max(delayMs, err.retryAfterMs), policy.maxDelayMs);
  }
  return {
    kind: "retry",
    delayMs,
    state: {
      attempt: state.attempt + 1,
      nextDelayMs: Math.min(state.nextDelayMs * 2, policy.maxDelayMs),
    },
  };
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface RetryOptions {
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Run `fn` until it succeeds, fails permanently or runs out of retries; the
 * last error is rethrown. No new attempt starts once `signal` is aborted.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions = {},
): Promise<T> {
  const sleep = opts.sleep ?? defaultSleep;
  let state = initialRetryState(policy);
  for (;;) {
    if (opts.signal?.aborted) throw new CancelledError();
    try {
      return await fn(state.attempt);
    } catch (err: unknown) {
      const step = nextRetryStep(state, err, policy);
      if (step.kind === "give-up") throw err;
      opts.onRetry?.({ attempt: state.attempt, delayMs: step.delayMs, error: err });
      try {
        await sleep(step.delayMs, opts.signal);
      } catch (sleepErr: unknown) {
        if (opts.signal?.aborted) throw new CancelledError();
        throw sleepErr;
      }
      state = step.state;
    }
  }
}
