import type { ErrorClass } from "./errors.js";

export type DeliveryState =
  | "pending"
  | "in_progress"
  | "succeeded"
  | "failed_retryable"
  | "failed_terminal"
  | "needs_reauth";

export interface DeliveryAttempt {
  documentId: string;
  destinationId: string;
  state: DeliveryState;
  attemptCount: number;
  lastErrorClass: ErrorClass | null;
  lastError: string | null;
  remoteRef: string | null;
  leaseExpiresAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface DeliveryOutcome {
  state: Exclude<DeliveryState, "pending" | "in_progress">;
  errorClass: ErrorClass | null;
  error: string | null;
  remoteRef: string | null;
}
