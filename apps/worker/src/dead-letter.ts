import { UnrecoverableError, type Job } from "bullmq";
import type { Logger } from "@docrelay/logger";
import type { DeadLetterJobData } from "@docrelay/queue";
import type { DeliveryJobData, StageJobData } from "@docrelay/types";

export type FailedJob = Pick<Job<StageJobData | DeliveryJobData>, "id" | "data" | "attemptsMade" | "opts">;

export interface DeadLetterSink {
  add(name: string, data: DeadLetterJobData): Promise<unknown>;
}

/** A job is dead once BullMQ will not run it again. */
export function isFinalFailure(job: FailedJob, error: Error): boolean {
  return error instanceof UnrecoverableError || job.attemptsMade >= (job.opts.attempts ?? 1);
}

/**
 * Returns a BullMQ `failed` listener that copies finally failed jobs to the
 * dead-letter queue. Failures to record them are logged, never rethrown.
 */
export function createDeadLetterForwarder(queueName: string, sink: DeadLetterSink, logger: Logger) {
  return async (job: FailedJob | undefined, error: Error): Promise<void> => {
    if (!job || !isFinalFailure(job, error)) {
      return;
    }
    const data: DeadLetterJobData = {
      ...job.data,
      originalQueue: queueName,
      originalJobId: job.id ?? null,
      failureReason: error.message,
      attemptsMade: job.attemptsMade,
    };
    try {
      await sink.add(queueName, data);
      logger.warn(
        { queue: queueName, jobId: job.id, documentId: job.data.documentId, reason: error.message },
        "job moved to dead-letter queue",
      );
    } catch (dlqError: unknown) {
      logger.error({ queue: queueName, jobId: job.id, err: dlqError }, "could not record dead job");
    }
  };
}
