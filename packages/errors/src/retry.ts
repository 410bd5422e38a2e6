import type { RetryPolicy } from "@docrelay/types";
import type { Logger } from "@docrelay/logger";
import { classifyError } from "./classify.js";

export interface RetryOptions extends Partial<RetryPolicy> {
  /** Label used in log lines. */
  operation?: string;
  logger?: Pick<Logger, "warn">;
  /** Called before each backoff sleep with the 1-based attempt that just failed. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  factor: 2,
  maxDelayMs: 30_000,
};

/**
 * Delay before retrying after the given 1-based attempt, with jitter.
 * delay = min(maxDelay, baseDelay * factor^(attempt-1)) * random(0.5, 1.0)
 */
export function calculateDelay(attempt: number, policy: RetryPolicy): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(policy.factor, attempt - 1);
  const cappedDelay = Math.min(policy.maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with bounded exponential backoff.
 * Only transient errors are retried; every other class is rethrown immediately.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options?: RetryOptions): Promise<T> {
  const policy: RetryPolicy = {
    maxAttempts: options?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: options?.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    factor: options?.factor ?? DEFAULT_RETRY_POLICY.factor,
    maxDelayMs: options?.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
  };
  const wait = options?.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxAttempts || classifyError(error) !== "transient") {
        break;
      }

      const delay = calculateDelay(attempt, policy);
      options?.logger?.warn(
        { operation: options.operation, attempt, maxAttempts, delayMs: delay, err: error },
        "attempt failed, retrying",
      );
      options?.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }

  throw lastError;
}
