import { pgTable, text, timestamp, jsonb, integer, pgEnum, index } from "drizzle-orm/pg-core";
import type { ExtractedMetadata, ExtractionFailure } from "@docrelay/types";

export const documentStatusEnum = pgEnum("document_status", [
  "received",
  "converting",
  "extracting",
  "delivering",
  "partially_delivered",
  "delivered",
  "failed",
]);

export const documentSourceEnum = pgEnum("document_source", ["upload", "url", "email"]);

export const documents = pgTable(
  "documents",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    originalName: text("original_name").notNull(),
    source: documentSourceEnum("source").notNull().default("upload"),
    sourceUrl: text("source_url"),
    storageKey: text("storage_key").notNull(),
    canonicalKey: text("canonical_key"),
    mimeType: text("mime_type").notNull(),
    sizeBytes: integer("size_bytes").notNull(),
    contentHash: text("content_hash").notNull(),
    status: documentStatusEnum("status").notNull().default("received"),
    failureReason: text("failure_reason", { enum: ["conversion_failed", "artifact_missing"] }),
    metadata: jsonb("metadata").$type<ExtractedMetadata>(),
    extractionErrors: jsonb("extraction_errors").$type<ExtractionFailure[]>().notNull().default([]),
    cancelledAt: timestamp("cancelled_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    contentHashIdx: index("documents_content_hash_idx").on(table.contentHash),
    statusIdx: index("documents_status_idx").on(table.status),
  }),
);
