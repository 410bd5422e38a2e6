export type PipelineStage = "convert" | "extract" | "dispatch";

export interface StageTask {
  documentId: string;
  stage: PipelineStage;
  attemptNumber: number;
  /** Runs the queue will make of this task; caps the live retry policy. */
  maxAttempts?: number;
}

export interface DeliveryTask {
  documentId: string;
  destinationId: string;
  attemptNumber: number;
  maxAttempts?: number;
}

/** Queue payloads; the attempt number comes from the queue itself. */
export interface StageJobData extends Omit<StageTask, "attemptNumber" | "maxAttempts"> {
  /** Set when a sweep re-queues the stage, so the job is not deduplicated against the lost one. */
  resumedAt?: number;
}

export interface DeliveryJobData extends Omit<DeliveryTask, "attemptNumber" | "maxAttempts"> {
  /**
   * Delivery attempts already made when the task was queued. Re-opened deliveries get
   * a new round so they are not deduplicated against the finished task.
   */
  round: number;
}

export type StageResult =
  | { outcome: "success" }
  | { outcome: "skipped"; reason: string }
  | { outcome: "retryable"; error: string }
  | { outcome: "terminal"; error: string };

/** Transport for stage transitions; implemented over BullMQ in production. */
export interface TaskQueue {
  enqueueStage(task: StageJobData): Promise<void>;
  enqueueDelivery(task: DeliveryJobData): Promise<void>;
}
