import { pgTable, text, timestamp, boolean } from "drizzle-orm/pg-core";

/** Sensitive values are stored sealed in `ciphertext`; `value` is then null. */
export const settings = pgTable("settings", {
  key: text("key").primaryKey(),
  value: text("value"),
  ciphertext: text("ciphertext"),
  sensitive: boolean("sensitive").notNull().default(false),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});
