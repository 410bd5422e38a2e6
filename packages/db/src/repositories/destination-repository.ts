import { asc, eq } from "drizzle-orm";
import type { DestinationConfig, DestinationRepository, NewDestination } from "@docrelay/types";
import type { DbExecutor } from "../client.js";
import { destinations } from "../schema/destinations.js";

export class DrizzleDestinationRepository implements DestinationRepository {
  constructor(private readonly db: DbExecutor) {}

  async get(id: string): Promise<DestinationConfig | null> {
    const [row] = await this.db
      .select()
      .from(destinations)
      .where(eq(destinations.id, id))
      .limit(1);
    return row ?? null;
  }

  async list(): Promise<DestinationConfig[]> {
    return this.db.select().from(destinations).orderBy(asc(destinations.createdAt));
  }

  async listEnabled(): Promise<DestinationConfig[]> {
    return this.db
      .select()
      .from(destinations)
      .where(eq(destinations.enabled, true))
      .orderBy(asc(destinations.createdAt));
  }

  async save(destination: NewDestination): Promise<DestinationConfig> {
    const { id, ...fields } = destination;
    const [row] = await this.db
      .insert(destinations)
      .values({ ...fields, id: id ?? crypto.randomUUID() })
      .onConflictDoUpdate({
        target: destinations.id,
        set: { ...fields, updatedAt: new Date() },
      })
      .returning();
    if (!row) {
      throw new Error("Destination upsert returned no row");
    }
    return row;
  }
}
