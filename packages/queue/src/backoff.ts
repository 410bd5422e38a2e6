import { calculateDelay } from "@docrelay/errors";
import type { RetryPolicy } from "@docrelay/types";

export const STAGE_BACKOFF = "stage-policy";

/**
 * BullMQ backoff strategy for jobs added with `{ type: STAGE_BACKOFF }`. The policy is
 * read on every retry, so `*.backoff_factor` and `*.max_delay_ms` changes apply to
 * jobs already queued.
 */
export function createBackoffStrategy(policy: () => Promise<RetryPolicy>) {
  return async (attemptsMade: number, type?: string): Promise<number> => {
    if (type !== STAGE_BACKOFF) {
      return 0;
    }
    return calculateDelay(Math.max(1, attemptsMade), await policy());
  };
}
