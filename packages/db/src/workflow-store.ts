import { and, asc, eq, inArray } from "drizzle-orm";
import type {
  Chunk,
  Document,
  DocumentPatch,
  EvaluationRecord,
  IEvaluationSink,
  IWorkflowStore,
  StoredChunk,
} from "@groundwork/types";
import { ConflictError, NotFoundError } from "@groundwork/errors";
import type { DbClient } from "./client.js";
import { chunks, documents, evaluationRecords } from "./schema/index.js";
import { toDocument, toEvaluationRow, toStoredChunk } from "./mappers.js";

const INSERT_BATCH_SIZE = 500;

/** Workflow state in Postgres, so runs resume across restarts and processes. */
export class DrizzleWorkflowStore implements IWorkflowStore {
  constructor(private readonly db: DbClient) {}

  async createDocument(document: Document): Promise<void> {
    const inserted = await this.db
      .insert(documents)
      .values({
        id: document.id,
        filename: document.filename,
        mimeType: document.mimeType,
        source: document.source,
        state: document.state,
        chunkCount: document.chunkCount,
        failure: document.failure,
        uploadedAt: document.uploadedAt,
        updatedAt: document.updatedAt,
      })
      .onConflictDoNothing({ target: documents.id })
      .returning({ id: documents.id });

    if (inserted.length === 0) {
      throw new ConflictError(`Document ${document.id} already exists`, {
        details: { documentId: document.id },
      });
    }
  }

  async getDocument(documentId: string): Promise<Document | null> {
    const [row] = await this.db
      .select()
      .from(documents)
      .where(eq(documents.id, documentId))
      .limit(1);
    return row ? toDocument(row) : null;
  }

  async listDocuments(): Promise<Document[]> {
    const rows = await this.db.select().from(documents).orderBy(asc(documents.uploadedAt));
    return rows.map(toDocument);
  }

  async updateDocument(documentId: string, patch: DocumentPatch): Promise<Document> {
    const [row] = await this.db
      .update(documents)
      .set({
        ...(patch.state !== undefined ? { state: patch.state } : {}),
        ...(patch.chunkCount !== undefined ? { chunkCount: patch.chunkCount } : {}),
        ...(patch.failure !== undefined ? { failure: patch.failure } : {}),
        updatedAt: new Date(),
      })
      .where(eq(documents.id, documentId))
      .returning();

    if (!row) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }
    return toDocument(row);
  }

  async deleteDocument(documentId: string): Promise<void> {
    // chunks cascade
    await this.db.delete(documents).where(eq(documents.id, documentId));
  }

  async saveChunks(documentId: string, items: Chunk[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.delete(chunks).where(eq(chunks.documentId, documentId));

      for (let i = 0; i < items.length; i += INSERT_BATCH_SIZE) {
        const batch = items.slice(i, i + INSERT_BATCH_SIZE);
        await tx.insert(chunks).values(
          batch.map((chunk) => ({
            id: chunk.id,
            documentId,
            index: chunk.index,
            content: chunk.content,
            tokenCount: chunk.tokenCount,
            span: chunk.span,
          })),
        );
      }
    });
  }

  async listChunks(documentId: string): Promise<StoredChunk[]> {
    const rows = await this.db
      .select()
      .from(chunks)
      .where(eq(chunks.documentId, documentId))
      .orderBy(asc(chunks.index));
    return rows.map(toStoredChunk);
  }

  async saveEmbeddings(documentId: string, embeddings: Map<string, number[]>): Promise<void> {
    if (embeddings.size === 0) return;

    await this.db.transaction(async (tx) => {
      for (const [chunkId, vector] of embeddings) {
        await tx
          .update(chunks)
          .set({ embedding: vector })
          .where(and(eq(chunks.documentId, documentId), eq(chunks.id, chunkId)));
      }
    });
  }

  async markIndexed(documentId: string, chunkIds: string[]): Promise<void> {
    if (chunkIds.length === 0) return;

    await this.db
      .update(chunks)
      .set({ indexed: true })
      .where(and(eq(chunks.documentId, documentId), inArray(chunks.id, chunkIds)));
  }

  async clearChunks(documentId: string): Promise<void> {
    await this.db.delete(chunks).where(eq(chunks.documentId, documentId));
  }
}

export class DrizzleEvaluationSink implements IEvaluationSink {
  constructor(private readonly db: DbClient) {}

  async append(record: EvaluationRecord): Promise<void> {
    await this.db.insert(evaluationRecords).values(toEvaluationRow(record));
  }
}
