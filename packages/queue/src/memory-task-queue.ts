import type { DeliveryJobData, StageJobData, TaskQueue } from "@docrelay/types";
import { deliveryJobId, stageJobId } from "./task-queue.js";

export type QueuedTask =
  | { kind: "stage"; id: string; data: StageJobData }
  | { kind: "delivery"; id: string; data: DeliveryJobData };

/** In-process TaskQueue with the same job-id deduplication as BullTaskQueue. */
export class MemoryTaskQueue implements TaskQueue {
  private readonly seen = new Set<string>();
  private readonly pending: QueuedTask[] = [];

  enqueueStage(task: StageJobData): Promise<void> {
    this.push({ kind: "stage", id: stageJobId(task), data: { ...task } });
    return Promise.resolve();
  }

  enqueueDelivery(task: DeliveryJobData): Promise<void> {
    this.push({ kind: "delivery", id: deliveryJobId(task), data: { ...task } });
    return Promise.resolve();
  }

  /** Remove and return the oldest queued task. */
  take(): QueuedTask | undefined {
    return this.pending.shift();
  }

  get size(): number {
    return this.pending.length;
  }

  peek(): readonly QueuedTask[] {
    return [...this.pending];
  }

  private push(task: QueuedTask): void {
    if (this.seen.has(task.id)) {
      return;
    }
    this.seen.add(task.id);
    this.pending.push(task);
  }
}
