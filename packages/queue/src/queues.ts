import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { DeliveryJobData, RetryPolicy, StageJobData } from "@docrelay/types";
import { STAGE_BACKOFF } from "./backoff.js";

// BullMQ reserves ":" as its key separator.
export const QUEUE_NAMES = {
  PIPELINE: "docrelay-pipeline",
  DELIVERY: "docrelay-delivery",
  MAINTENANCE: "docrelay-maintenance",
} as const;

export const MAINTENANCE_JOBS = {
  CREDENTIAL_CHECK: "credential-check",
  RESUME_STALLED: "resume-stalled",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
  /**
   * Queue-level retries for crashed or failed handlers. `maxAttempts` is fixed when the
   * queue is created and caps the live policy; delays come from the workers' backoff strategy.
   */
  stagePolicy: RetryPolicy;
}

export interface MaintenanceJobData {
  kind: (typeof MAINTENANCE_JOBS)[keyof typeof MAINTENANCE_JOBS];
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: config.stagePolicy.maxAttempts,
      backoff: { type: STAGE_BACKOFF },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  const pipelineQueue = new Queue<StageJobData>(QUEUE_NAMES.PIPELINE, defaultOpts);

  const deliveryQueue = new Queue<DeliveryJobData>(QUEUE_NAMES.DELIVERY, defaultOpts);

  const maintenanceQueue = new Queue<MaintenanceJobData>(QUEUE_NAMES.MAINTENANCE, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      attempts: 1,
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 100 },
    },
  });

  return { pipelineQueue, deliveryQueue, maintenanceQueue };
}

export type Queues = ReturnType<typeof createQueues>;

/** Schedule the periodic credential health check; re-registering keeps a single schedule. */
export async function scheduleCredentialCheck(queues: Queues, everyMs: number): Promise<void> {
  await queues.maintenanceQueue.add(
    MAINTENANCE_JOBS.CREDENTIAL_CHECK,
    { kind: MAINTENANCE_JOBS.CREDENTIAL_CHECK },
    { repeat: { every: everyMs }, jobId: MAINTENANCE_JOBS.CREDENTIAL_CHECK },
  );
}

/** Schedule the sweep that re-queues documents whose pipeline task was lost. */
export async function scheduleStalledSweep(queues: Queues, everyMs: number): Promise<void> {
  await queues.maintenanceQueue.add(
    MAINTENANCE_JOBS.RESUME_STALLED,
    { kind: MAINTENANCE_JOBS.RESUME_STALLED },
    { repeat: { every: everyMs }, jobId: MAINTENANCE_JOBS.RESUME_STALLED },
  );
}

export async function closeQueues(queues: Queues): Promise<void> {
  await Promise.all([
    queues.pipelineQueue.close(),
    queues.deliveryQueue.close(),
    queues.maintenanceQueue.close(),
  ]);
}
