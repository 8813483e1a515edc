import { setTimeout as delay } from "node:timers/promises";
import { isResticError, type ErrorKind, type ResticError } from "./errors.js";
import { log } from "../utils/logger.js";

export interface RetryPolicy {
  /** Upper bound on calls to the operation, including the first. */
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffFactor: number;
  /** Fraction of the delay added or removed at random (0.1 = ±10%). */
  jitter: number;
  retryOn: readonly ErrorKind[];
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialBackoffMs: 1_000,
  maxBackoffMs: 30_000,
  backoffFactor: 2,
  jitter: 0.1,
  retryOn: ["network", "repository"],
};

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  /** Uniform source in [0, 1). */
  random?: () => number;
  onRetry?: (attempt: number, error: ResticError, delayMs: number) => void;
}

/**
 * Delay before the attempt that follows `attempt` (1-based).
 */
export function computeBackoff(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const base = Math.min(
    policy.maxBackoffMs,
    policy.initialBackoffMs * policy.backoffFactor ** (attempt - 1),
  );
  const spread = (random() * 2 - 1) * policy.jitter;
  return base * (1 + spread);
}

/**
 * Run `operation`, retrying with exponential backoff while it fails with a
 * {@link ResticError} whose kind is in `policy.retryOn`. Anything else is
 * rethrown on first occurrence.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: Partial<RetryPolicy> = {},
  hooks: RetryHooks = {},
): Promise<T> {
  const effective: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };
  const sleep = hooks.sleep ?? ((ms: number) => delay(ms));
  const maxAttempts = Math.max(1, Math.floor(effective.maxAttempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (err) {
      if (!isResticError(err) || !effective.retryOn.includes(err.kind)) {
        throw err;
      }
      if (attempt >= maxAttempts) {
        log.debug(`All ${maxAttempts} attempts failed: ${err.toString()}`);
        throw err;
      }

      const waitMs = computeBackoff(attempt, effective, hooks.random);
      log.warn(
        `Attempt ${attempt}/${maxAttempts} failed: ${err.toString()}. Retrying in ${(waitMs / 1000).toFixed(2)}s.`,
      );
      hooks.onRetry?.(attempt, err, waitMs);
      await sleep(waitMs);
    }
  }
}
