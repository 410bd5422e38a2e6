import { asc, eq } from "drizzle-orm";
import type { SettingsRepository, StoredSetting } from "@docrelay/types";
import type { DbExecutor } from "../client.js";
import { settings } from "../schema/settings.js";

export class DrizzleSettingsRepository implements SettingsRepository {
  constructor(private readonly db: DbExecutor) {}

  async get(key: string): Promise<StoredSetting | null> {
    const [row] = await this.db.select().from(settings).where(eq(settings.key, key)).limit(1);
    return row ?? null;
  }

  async list(): Promise<StoredSetting[]> {
    return this.db.select().from(settings).orderBy(asc(settings.key));
  }

  async upsert(setting: Omit<StoredSetting, "updatedAt">): Promise<StoredSetting> {
    const updatedAt = new Date();
    const [row] = await this.db
      .insert(settings)
      .values({ ...setting, updatedAt })
      .onConflictDoUpdate({
        target: settings.key,
        set: {
          value: setting.value,
          ciphertext: setting.ciphertext,
          sensitive: setting.sensitive,
          updatedAt,
        },
      })
      .returning();
    if (!row) {
      throw new Error(`Setting upsert for ${setting.key} returned no row`);
    }
    return row;
  }

  async delete(key: string): Promise<void> {
    await this.db.delete(settings).where(eq(settings.key, key));
  }
}
