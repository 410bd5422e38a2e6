import { UnrecoverableError } from "bullmq";
import type { StageResult } from "@docrelay/types";

export class RetryableStageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RetryableStageError";
  }
}

/**
 * Translate a handler result into BullMQ's terms: `retryable` throws so the job is
 * retried with backoff, `terminal` throws UnrecoverableError so it fails at once.
 */
export function settleStageResult(result: StageResult): void {
  switch (result.outcome) {
    case "success":
    case "skipped":
      return;
    case "retryable":
      throw new RetryableStageError(result.error);
    case "terminal":
      throw new UnrecoverableError(result.error);
  }
}
