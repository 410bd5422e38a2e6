import type { DeliveryAttempt, DeliveryState, Document, DocumentStatus } from "@docrelay/types";

const UNFINISHED_STATES: readonly DeliveryState[] = ["pending", "in_progress", "failed_retryable"];

/** Statuses the delivery aggregate may move between. */
export const DELIVERY_PHASE_STATUSES: readonly DocumentStatus[] = [
  "delivering",
  "partially_delivered",
  "delivered",
];

/**
 * Aggregate status over the currently enabled destinations: `delivered` when all
 * succeeded (or there are none), `delivering` while any is unfinished, and
 * `partially_delivered` otherwise. An enabled destination without an attempt yet
 * (enabled after dispatch) is unfinished; the stalled sweep dispatches to it.
 */
export function aggregateDeliveryStatus(
  attempts: readonly DeliveryAttempt[],
  enabledDestinationIds: ReadonlySet<string>,
): DocumentStatus {
  const states = new Map<string, DeliveryState>();
  for (const attempt of attempts) {
    if (enabledDestinationIds.has(attempt.destinationId)) {
      states.set(attempt.destinationId, attempt.state);
    }
  }
  for (const destinationId of enabledDestinationIds) {
    if (!states.has(destinationId)) {
      states.set(destinationId, "pending");
    }
  }

  const relevant = [...states.values()];
  if (relevant.every((state) => state === "succeeded")) {
    return "delivered";
  }
  if (relevant.some((state) => UNFINISHED_STATES.includes(state))) {
    return "delivering";
  }
  return "partially_delivered";
}

/** The document's next status; outside the delivery phase it never changes here. */
export function nextDocumentStatus(
  document: Document,
  attempts: readonly DeliveryAttempt[],
  enabledDestinationIds: ReadonlySet<string>,
): DocumentStatus {
  if (!DELIVERY_PHASE_STATUSES.includes(document.status)) {
    return document.status;
  }
  return aggregateDeliveryStatus(attempts, enabledDestinationIds);
}
