import { and, asc, eq, inArray, isNull, lt } from "drizzle-orm";
import { NotFoundError } from "@docrelay/errors";
import type {
  DeliveryAttempt,
  Document,
  DocumentPatch,
  DocumentRepository,
  DocumentStatus,
  NewDocument,
} from "@docrelay/types";
import type { DbExecutor } from "../client.js";
import { documents } from "../schema/documents.js";
import { deliveryAttempts } from "../schema/delivery-attempts.js";

export class DrizzleDocumentRepository implements DocumentRepository {
  constructor(private readonly db: DbExecutor) {}

  async create(input: NewDocument): Promise<Document> {
    const [row] = await this.db.insert(documents).values(input).returning();
    if (!row) {
      throw new Error("Document insert returned no row");
    }
    return row;
  }

  async get(id: string): Promise<Document | null> {
    const [row] = await this.db.select().from(documents).where(eq(documents.id, id)).limit(1);
    return row ?? null;
  }

  async update(id: string, patch: DocumentPatch): Promise<Document> {
    const [row] = await this.db
      .update(documents)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(documents.id, id))
      .returning();
    if (!row) {
      throw new NotFoundError(`Document ${id} not found`, { details: { documentId: id } });
    }
    return row;
  }

  async transition(
    id: string,
    from: readonly DocumentStatus[],
    to: DocumentStatus,
    patch: DocumentPatch = {},
  ): Promise<Document | null> {
    const [row] = await this.db
      .update(documents)
      .set({ ...patch, status: to, updatedAt: new Date() })
      .where(and(eq(documents.id, id), inArray(documents.status, [...from])))
      .returning();
    return row ?? null;
  }

  async recomputeStatus(
    id: string,
    compute: (document: Document, attempts: DeliveryAttempt[]) => DocumentStatus,
  ): Promise<Document> {
    return this.db.transaction(async (tx) => {
      const [locked] = await tx
        .select()
        .from(documents)
        .where(eq(documents.id, id))
        .for("update");
      if (!locked) {
        throw new NotFoundError(`Document ${id} not found`, { details: { documentId: id } });
      }

      const attempts = await tx
        .select()
        .from(deliveryAttempts)
        .where(eq(deliveryAttempts.documentId, id));

      const status = compute(locked, attempts);
      if (status === locked.status) {
        return locked;
      }

      const [row] = await tx
        .update(documents)
        .set({ status, updatedAt: new Date() })
        .where(eq(documents.id, id))
        .returning();
      return row ?? locked;
    });
  }

  async listStalled(
    statuses: readonly DocumentStatus[],
    updatedBefore: Date,
    limit: number,
  ): Promise<Document[]> {
    return this.db
      .select()
      .from(documents)
      .where(
        and(
          inArray(documents.status, [...statuses]),
          lt(documents.updatedAt, updatedBefore),
          isNull(documents.cancelledAt),
        ),
      )
      .orderBy(asc(documents.updatedAt))
      .limit(limit);
  }
}
