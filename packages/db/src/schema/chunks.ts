import { pgTable, text, timestamp, jsonb, integer, boolean, index } from "drizzle-orm/pg-core";
import type { ChunkSpan } from "@groundwork/types";
import { documents } from "./documents.js";

export const chunks = pgTable(
  "chunks",
  {
    id: text("id").primaryKey(),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    index: integer("index").notNull(),
    content: text("content").notNull(),
    tokenCount: integer("token_count").notNull(),
    span: jsonb("span").notNull().$type<ChunkSpan>(),
    // Checkpoints written by the ingestion workflow
    embedding: jsonb("embedding").$type<number[]>(),
    indexed: boolean("indexed").notNull().default(false),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("chunks_document_idx").on(table.documentId, table.index)],
);

export type ChunkRow = typeof chunks.$inferSelect;
