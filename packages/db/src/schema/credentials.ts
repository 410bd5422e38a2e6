import { pgTable, text, timestamp, pgEnum } from "drizzle-orm/pg-core";
import { destinations } from "./destinations.js";

export const oauthProviderEnum = pgEnum("oauth_provider", ["google_drive", "onedrive", "dropbox"]);

export const credentialStatusEnum = pgEnum("credential_status", [
  "authorizing",
  "valid",
  "expired",
  "revoked",
]);

export const credentialTokens = pgTable("credential_tokens", {
  destinationId: text("destination_id")
    .primaryKey()
    .references(() => destinations.id, { onDelete: "cascade" }),
  provider: oauthProviderEnum("provider").notNull(),
  accessToken: text("access_token"),
  refreshToken: text("refresh_token"),
  expiresAt: timestamp("expires_at", { withTimezone: true }),
  refreshExpiresAt: timestamp("refresh_expires_at", { withTimezone: true }),
  scope: text("scope"),
  status: credentialStatusEnum("status").notNull().default("authorizing"),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export const oauthStates = pgTable("oauth_states", {
  token: text("token").primaryKey(),
  destinationId: text("destination_id")
    .notNull()
    .references(() => destinations.id, { onDelete: "cascade" }),
  provider: oauthProviderEnum("provider").notNull(),
  redirectUri: text("redirect_uri").notNull(),
  expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
});
