import { pgTable, text, timestamp, jsonb, integer, pgEnum } from "drizzle-orm/pg-core";
import type { DocumentFailure, DocumentSource } from "@groundwork/types";

export const workflowStateEnum = pgEnum("workflow_state", [
  "received",
  "splitting",
  "embedding",
  "indexing",
  "completed",
  "failed",
]);

export const documents = pgTable("documents", {
  id: text("id").primaryKey(),
  filename: text("filename").notNull(),
  mimeType: text("mime_type").notNull().default("text/plain"),
  source: jsonb("source").notNull().$type<DocumentSource>(),
  state: workflowStateEnum("state").notNull().default("received"),
  chunkCount: integer("chunk_count").notNull().default(0),
  failure: jsonb("failure").$type<DocumentFailure>(),
  uploadedAt: timestamp("uploaded_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export type DocumentRow = typeof documents.$inferSelect;
