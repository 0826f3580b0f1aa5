import { sql } from "drizzle-orm";
import type { DbClient } from "./client.js";

/**
 * Idempotent DDL for the workflow and evaluation tables. Run once at
 * startup, before the first store call.
 */
export function getSchemaMigrationSql(): string[] {
  return [
    `DO $$ BEGIN
      CREATE TYPE workflow_state AS ENUM
        ('received', 'splitting', 'embedding', 'indexing', 'completed', 'failed');
    EXCEPTION WHEN duplicate_object THEN NULL;
    END $$`,

    `CREATE TABLE IF NOT EXISTS documents (
      id text PRIMARY KEY,
      filename text NOT NULL,
      mime_type text NOT NULL DEFAULT 'text/plain',
      source jsonb NOT NULL,
      state workflow_state NOT NULL DEFAULT 'received',
      chunk_count integer NOT NULL DEFAULT 0,
      failure jsonb,
      uploaded_at timestamptz NOT NULL DEFAULT now(),
      updated_at timestamptz NOT NULL DEFAULT now()
    )`,

    `CREATE TABLE IF NOT EXISTS chunks (
      id text PRIMARY KEY,
      document_id text NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
      index integer NOT NULL,
      content text NOT NULL,
      token_count integer NOT NULL,
      span jsonb NOT NULL,
      embedding jsonb,
      indexed boolean NOT NULL DEFAULT false,
      created_at timestamptz NOT NULL DEFAULT now()
    )`,
    `CREATE INDEX IF NOT EXISTS chunks_document_idx ON chunks (document_id, index)`,

    `CREATE TABLE IF NOT EXISTS evaluation_records (
      id serial PRIMARY KEY,
      run_id text NOT NULL,
      question text NOT NULL,
      reference text,
      answer text NOT NULL,
      contexts jsonb NOT NULL,
      faithfulness real NOT NULL,
      relevancy real NOT NULL,
      created_at timestamptz NOT NULL DEFAULT now()
    )`,
    `CREATE INDEX IF NOT EXISTS evaluation_records_run_idx ON evaluation_records (run_id)`,
  ];
}

export async function migrate(db: DbClient): Promise<void> {
  for (const statement of getSchemaMigrationSql()) {
    await db.execute(sql.raw(statement));
  }
}
