import type { Job } from "bullmq";
import type { Orchestrator } from "@docrelay/core";
import { settleStageResult } from "@docrelay/queue";
import type { DeliveryJobData } from "@docrelay/types";

export type DeliveryJob = Pick<Job<DeliveryJobData>, "data" | "attemptsMade" | "opts">;

/** Delivery processor: upload one document to one destination. */
export function createDeliveryProcessor(orchestrator: Pick<Orchestrator, "handleDelivery">) {
  return async (job: DeliveryJob): Promise<void> => {
    const result = await orchestrator.handleDelivery({
      documentId: job.data.documentId,
      destinationId: job.data.destinationId,
      attemptNumber: job.attemptsMade + 1,
      maxAttempts: job.opts.attempts,
    });
    settleStageResult(result);
  };
}
