import type { JobsOptions } from "bullmq";
import type { DeliveryJobData, StageJobData, TaskQueue } from "@docrelay/types";

/** The part of a BullMQ Queue the task queue calls. */
export interface JobAdder<T> {
  add(name: string, data: T, opts?: JobsOptions): Promise<unknown>;
}

export interface BullTaskQueueOptions {
  pipeline: JobAdder<StageJobData>;
  delivery: JobAdder<DeliveryJobData>;
}

export function stageJobId(task: StageJobData): string {
  const id = `${task.documentId}-${task.stage}`;
  return task.resumedAt === undefined ? id : `${id}-${String(task.resumedAt)}`;
}

export function deliveryJobId(task: DeliveryJobData): string {
  return `${task.documentId}-${task.destinationId}-${String(task.round)}`;
}

/**
 * TaskQueue over BullMQ. Job ids are derived from the task, so re-enqueueing a stage
 * that is already queued, running or retained is a no-op.
 */
export class BullTaskQueue implements TaskQueue {
  constructor(private readonly queues: BullTaskQueueOptions) {}

  async enqueueStage(task: StageJobData): Promise<void> {
    await this.queues.pipeline.add(task.stage, task, { jobId: stageJobId(task) });
  }

  async enqueueDelivery(task: DeliveryJobData): Promise<void> {
    await this.queues.delivery.add("deliver", task, { jobId: deliveryJobId(task) });
  }
}
