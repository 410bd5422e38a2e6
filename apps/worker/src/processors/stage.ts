import type { Job } from "bullmq";
import type { Orchestrator } from "@docrelay/core";
import { settleStageResult } from "@docrelay/queue";
import type { StageJobData } from "@docrelay/types";

export type StageJob = Pick<Job<StageJobData>, "data" | "attemptsMade" | "opts">;

/**
 * Pipeline stage processor: convert, extract or dispatch one document.
 * `attemptsMade` counts the runs before this one.
 */
export function createStageProcessor(orchestrator: Pick<Orchestrator, "handleStage">) {
  return async (job: StageJob): Promise<void> => {
    const result = await orchestrator.handleStage({
      documentId: job.data.documentId,
      stage: job.data.stage,
      attemptNumber: job.attemptsMade + 1,
      maxAttempts: job.opts.attempts,
    });
    settleStageResult(result);
  };
}
