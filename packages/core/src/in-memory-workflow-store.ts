import type {
  Chunk,
  Document,
  DocumentPatch,
  IWorkflowStore,
  StoredChunk,
} from "@groundwork/types";
import { ConflictError, NotFoundError } from "@groundwork/errors";

function copyChunk(chunk: StoredChunk): StoredChunk {
  return {
    ...chunk,
    span: { ...chunk.span },
    embedding: chunk.embedding ? [...chunk.embedding] : null,
  };
}

/**
 * Workflow state held in process memory. Survives step failures but not a
 * restart; use the Drizzle store when runs must resume across processes.
 */
export class InMemoryWorkflowStore implements IWorkflowStore {
  private documents = new Map<string, Document>();
  private chunks = new Map<string, StoredChunk[]>();

  async createDocument(document: Document): Promise<void> {
    if (this.documents.has(document.id)) {
      throw new ConflictError(`Document ${document.id} already exists`, {
        details: { documentId: document.id },
      });
    }
    this.documents.set(document.id, { ...document });
  }

  async getDocument(documentId: string): Promise<Document | null> {
    const document = this.documents.get(documentId);
    return document ? { ...document } : null;
  }

  async listDocuments(): Promise<Document[]> {
    return [...this.documents.values()]
      .sort((a, b) => a.uploadedAt.getTime() - b.uploadedAt.getTime())
      .map((d) => ({ ...d }));
  }

  async updateDocument(documentId: string, patch: DocumentPatch): Promise<Document> {
    const current = this.documents.get(documentId);
    if (!current) {
      throw new NotFoundError(`Document ${documentId} not found`);
    }
    const next: Document = { ...current, ...patch, updatedAt: new Date() };
    this.documents.set(documentId, next);
    return { ...next };
  }

  async deleteDocument(documentId: string): Promise<void> {
    this.documents.delete(documentId);
    this.chunks.delete(documentId);
  }

  async saveChunks(documentId: string, chunks: Chunk[]): Promise<void> {
    this.chunks.set(
      documentId,
      chunks.map((chunk) => ({ ...chunk, span: { ...chunk.span }, embedding: null, indexed: false })),
    );
  }

  async listChunks(documentId: string): Promise<StoredChunk[]> {
    return (this.chunks.get(documentId) ?? []).map(copyChunk);
  }

  async saveEmbeddings(documentId: string, embeddings: Map<string, number[]>): Promise<void> {
    for (const chunk of this.chunks.get(documentId) ?? []) {
      const vector = embeddings.get(chunk.id);
      if (vector) {
        chunk.embedding = [...vector];
      }
    }
  }

  async markIndexed(documentId: string, chunkIds: string[]): Promise<void> {
    const ids = new Set(chunkIds);
    for (const chunk of this.chunks.get(documentId) ?? []) {
      if (ids.has(chunk.id)) {
        chunk.indexed = true;
      }
    }
  }

  async clearChunks(documentId: string): Promise<void> {
    this.chunks.delete(documentId);
  }
}
