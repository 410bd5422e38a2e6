import { eq } from "drizzle-orm";
import type { CredentialRepository, CredentialToken, OAuthState } from "@docrelay/types";
import type { DbExecutor } from "../client.js";
import { credentialTokens, oauthStates } from "../schema/credentials.js";

export class DrizzleCredentialRepository implements CredentialRepository {
  constructor(private readonly db: DbExecutor) {}

  async get(destinationId: string): Promise<CredentialToken | null> {
    const [row] = await this.db
      .select()
      .from(credentialTokens)
      .where(eq(credentialTokens.destinationId, destinationId))
      .limit(1);
    return row ?? null;
  }

  async list(): Promise<CredentialToken[]> {
    return this.db.select().from(credentialTokens);
  }

  async save(token: Omit<CredentialToken, "updatedAt">): Promise<CredentialToken> {
    const { destinationId, ...fields } = token;
    const updatedAt = new Date();
    const [row] = await this.db
      .insert(credentialTokens)
      .values({ ...token, updatedAt })
      .onConflictDoUpdate({
        target: credentialTokens.destinationId,
        set: { ...fields, updatedAt },
      })
      .returning();
    if (!row) {
      throw new Error(`Credential upsert for ${destinationId} returned no row`);
    }
    return row;
  }

  async saveState(state: OAuthState): Promise<void> {
    await this.db.insert(oauthStates).values(state);
  }

  async consumeState(token: string): Promise<OAuthState | null> {
    const [row] = await this.db.delete(oauthStates).where(eq(oauthStates.token, token)).returning();
    return row ?? null;
  }
}
