import { and, eq, inArray, lt, or, sql } from "drizzle-orm";
import type { DeliveryAttempt, DeliveryOutcome, DeliveryRepository } from "@docrelay/types";
import type { DbExecutor } from "../client.js";
import { deliveryAttempts } from "../schema/delivery-attempts.js";

function pair(documentId: string, destinationId: string) {
  return and(
    eq(deliveryAttempts.documentId, documentId),
    eq(deliveryAttempts.destinationId, destinationId),
  );
}

export class DrizzleDeliveryRepository implements DeliveryRepository {
  constructor(private readonly db: DbExecutor) {}

  async get(documentId: string, destinationId: string): Promise<DeliveryAttempt | null> {
    const [row] = await this.db
      .select()
      .from(deliveryAttempts)
      .where(pair(documentId, destinationId))
      .limit(1);
    return row ?? null;
  }

  async listForDocument(documentId: string): Promise<DeliveryAttempt[]> {
    return this.db
      .select()
      .from(deliveryAttempts)
      .where(eq(deliveryAttempts.documentId, documentId));
  }

  async ensure(documentId: string, destinationId: string): Promise<DeliveryAttempt> {
    const [inserted] = await this.db
      .insert(deliveryAttempts)
      .values({ documentId, destinationId })
      .onConflictDoNothing()
      .returning();
    if (inserted) {
      return inserted;
    }

    const existing = await this.get(documentId, destinationId);
    if (!existing) {
      throw new Error(`Delivery attempt ${documentId}/${destinationId} vanished after insert`);
    }
    return existing;
  }

  async claim(
    documentId: string,
    destinationId: string,
    leaseMs: number,
    now: Date,
  ): Promise<DeliveryAttempt | null> {
    // Single conditional UPDATE: Postgres row locking makes this the per-pair mutex.
    const [row] = await this.db
      .update(deliveryAttempts)
      .set({
        state: "in_progress",
        attemptCount: sql`${deliveryAttempts.attemptCount} + 1`,
        leaseExpiresAt: new Date(now.getTime() + leaseMs),
        updatedAt: now,
      })
      .where(
        and(
          pair(documentId, destinationId),
          or(
            inArray(deliveryAttempts.state, ["pending", "failed_retryable"]),
            and(
              eq(deliveryAttempts.state, "in_progress"),
              lt(deliveryAttempts.leaseExpiresAt, now),
            ),
          ),
        ),
      )
      .returning();
    return row ?? null;
  }

  async complete(
    documentId: string,
    destinationId: string,
    attemptCount: number,
    outcome: DeliveryOutcome,
  ): Promise<DeliveryAttempt | null> {
    const [row] = await this.db
      .update(deliveryAttempts)
      .set({
        state: outcome.state,
        lastErrorClass: outcome.errorClass,
        lastError: outcome.error,
        remoteRef: outcome.remoteRef,
        leaseExpiresAt: null,
        updatedAt: new Date(),
      })
      .where(
        and(
          pair(documentId, destinationId),
          eq(deliveryAttempts.state, "in_progress"),
          eq(deliveryAttempts.attemptCount, attemptCount),
        ),
      )
      .returning();
    return row ?? null;
  }

  async reopenForDestination(destinationId: string): Promise<DeliveryAttempt[]> {
    return this.db
      .update(deliveryAttempts)
      .set({ state: "pending", leaseExpiresAt: null, updatedAt: new Date() })
      .where(
        and(
          eq(deliveryAttempts.destinationId, destinationId),
          eq(deliveryAttempts.state, "needs_reauth"),
        ),
      )
      .returning();
  }
}
