// api/src/common/utils/retry.utils.ts

import { setTimeout as delay } from 'node:timers/promises';

export interface BackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Multiplier applied per attempt; 2 doubles the delay each time. */
  factor?: number;
}

/**
 * Delay before retry number `attempt` (1-based): base * factor^(attempt-1), capped.
 */
export function backoffDelay(attempt: number, cfg: BackoffConfig): number {
  const factor = cfg.factor ?? 2;
  const raw = cfg.baseDelayMs * Math.pow(factor, Math.max(0, attempt - 1));
  return Math.min(raw, cfg.maxDelayMs);
}

/**
 * Returns the delay in ms before the next attempt, or undefined to give up
 * and rethrow. `attempt` is the number of the attempt that just failed.
 */
export type RetryDecision = (error: unknown, attempt: number) => number | undefined;

export interface RetryOptions {
  decide: RetryDecision;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Runs `task` until it resolves or `decide` refuses another attempt.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  opts: RetryOptions,
): Promise<T> {
  const sleep = opts.sleep ?? ((ms: number) => delay(ms));
  let attempt = 1;

  for (;;) {
    try {
      return await task(attempt);
    } catch (error) {
      const wait = opts.decide(error, attempt);
      if (wait === undefined) throw error;
      opts.onRetry?.(error, attempt, wait);
      await sleep(wait);
      attempt++;
    }
  }
}
