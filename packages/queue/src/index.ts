export {
  QUEUE_NAMES,
  MAINTENANCE_JOBS,
  createQueues,
  closeQueues,
  scheduleCredentialCheck,
  scheduleStalledSweep,
} from "./queues.js";
export type { QueueConfig, Queues, MaintenanceJobData } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue } from "./dlq.js";
export type { DeadLetterJobData } from "./dlq.js";
export { parseRedisConnection } from "./connection.js";
export { BullTaskQueue, deliveryJobId, stageJobId } from "./task-queue.js";
export type { BullTaskQueueOptions, JobAdder } from "./task-queue.js";
export { MemoryTaskQueue } from "./memory-task-queue.js";
export type { QueuedTask } from "./memory-task-queue.js";
export { STAGE_BACKOFF, createBackoffStrategy } from "./backoff.js";
export { RetryableStageError, settleStageResult } from "./results.js";
