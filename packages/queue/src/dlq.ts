import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { DeliveryJobData, StageJobData } from "@docrelay/types";

export const DLQ_NAME = "docrelay-dead-letter";

export type DeadLetterJobData = (StageJobData | DeliveryJobData) & {
  originalQueue: string;
  originalJobId: string | null;
  failureReason: string;
  attemptsMade: number;
};

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterJobData>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}
