import type { Job } from "bullmq";
import type { Orchestrator } from "@docrelay/core";
import { MAINTENANCE_JOBS, type MaintenanceJobData } from "@docrelay/queue";

export type MaintenanceJob = Pick<Job<MaintenanceJobData>, "data">;

export interface MaintenanceOptions {
  /** A document untouched for this long in a pipeline status is resumed. */
  stalledAfterMs: number;
}

/** Periodic housekeeping: the credential health check and the stalled-document sweep. */
export function createMaintenanceProcessor(
  orchestrator: Pick<Orchestrator, "checkCredentials" | "resumeStalled">,
  options: MaintenanceOptions,
) {
  return async (job: MaintenanceJob): Promise<void> => {
    switch (job.data.kind) {
      case MAINTENANCE_JOBS.CREDENTIAL_CHECK:
        await orchestrator.checkCredentials();
        return;
      case MAINTENANCE_JOBS.RESUME_STALLED:
        await orchestrator.resumeStalled(options.stalledAfterMs);
        return;
    }
  };
}
