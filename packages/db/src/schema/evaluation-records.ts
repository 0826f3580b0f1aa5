import { pgTable, text, timestamp, jsonb, real, serial, index } from "drizzle-orm/pg-core";

export const evaluationRecords = pgTable(
  "evaluation_records",
  {
    id: serial("id").primaryKey(),
    runId: text("run_id").notNull(),
    question: text("question").notNull(),
    reference: text("reference"),
    answer: text("answer").notNull(),
    contexts: jsonb("contexts").notNull().$type<string[]>(),
    faithfulness: real("faithfulness").notNull(),
    relevancy: real("relevancy").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("evaluation_records_run_idx").on(table.runId)],
);
