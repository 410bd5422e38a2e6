import { pgTable, text, timestamp, jsonb, boolean, pgEnum } from "drizzle-orm/pg-core";
import { DESTINATION_TYPES } from "@docrelay/types";

export const destinationTypeEnum = pgEnum("destination_type", DESTINATION_TYPES);

export const destinations = pgTable("destinations", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  name: text("name").notNull(),
  type: destinationTypeEnum("type").notNull(),
  enabled: boolean("enabled").notNull().default(true),
  targetPathTemplate: text("target_path_template").notNull().default("{filename}"),
  credentialRef: text("credential_ref").notNull(),
  options: jsonb("options").$type<Record<string, string>>().notNull().default({}),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});
