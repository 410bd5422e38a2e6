import { pgTable, text, timestamp, integer, pgEnum, primaryKey, index } from "drizzle-orm/pg-core";
import { documents } from "./documents.js";
import { destinations } from "./destinations.js";

export const deliveryStateEnum = pgEnum("delivery_state", [
  "pending",
  "in_progress",
  "succeeded",
  "failed_retryable",
  "failed_terminal",
  "needs_reauth",
]);

export const deliveryAttempts = pgTable(
  "delivery_attempts",
  {
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "restrict" }),
    destinationId: text("destination_id")
      .notNull()
      .references(() => destinations.id, { onDelete: "restrict" }),
    state: deliveryStateEnum("state").notNull().default("pending"),
    attemptCount: integer("attempt_count").notNull().default(0),
    lastErrorClass: text("last_error_class", {
      enum: ["validation", "transient", "auth_expired", "permanent", "internal"],
    }),
    lastError: text("last_error"),
    remoteRef: text("remote_ref"),
    leaseExpiresAt: timestamp("lease_expires_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.documentId, table.destinationId] }),
    destinationStateIdx: index("delivery_attempts_destination_state_idx").on(
      table.destinationId,
      table.state,
    ),
  }),
);
