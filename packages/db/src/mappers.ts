import type { Document, EvaluationRecord, StoredChunk } from "@groundwork/types";
import type { ChunkRow, DocumentRow } from "./schema/index.js";
import type { evaluationRecords } from "./schema/index.js";

export type EvaluationInsert = typeof evaluationRecords.$inferInsert;

export function toDocument(row: DocumentRow): Document {
  return {
    id: row.id,
    filename: row.filename,
    mimeType: row.mimeType,
    source: row.source,
    state: row.state,
    chunkCount: row.chunkCount,
    failure: row.failure ?? null,
    uploadedAt: row.uploadedAt,
    updatedAt: row.updatedAt,
  };
}

export function toStoredChunk(row: ChunkRow): StoredChunk {
  return {
    id: row.id,
    documentId: row.documentId,
    index: row.index,
    content: row.content,
    tokenCount: row.tokenCount,
    span: row.span,
    embedding: row.embedding ?? null,
    indexed: row.indexed,
  };
}

export function toEvaluationRow(record: EvaluationRecord): EvaluationInsert {
  return {
    runId: record.runId,
    question: record.question,
    reference: record.reference ?? null,
    answer: record.answer,
    contexts: record.contexts,
    faithfulness: record.faithfulness,
    relevancy: record.relevancy,
    createdAt: record.createdAt,
  };
}
