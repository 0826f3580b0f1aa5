import type { Chunk } from "./chunk.js";
import type { Document, DocumentFailure, WorkflowState } from "./document.js";

export interface ParseResult {
  text: string;
  pageCount: number;
  metadata: Record<string, unknown>;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface IndexedRecordPayload {
  documentId: string;
  chunkId: string;
  chunkIndex: number;
  text: string;
  filename: string;
  uploadedAt: string;
  tokenCount: number;
}

export interface IndexedRecord extends IndexedRecordPayload {
  id: string;
  vector: number[];
}

/** Chunk plus the checkpoints the ingestion workflow has recorded for it. */
export interface StoredChunk extends Chunk {
  embedding: number[] | null;
  indexed: boolean;
}

export interface DocumentPatch {
  state?: WorkflowState;
  chunkCount?: number;
  failure?: DocumentFailure | null;
}

export interface IWorkflowStore {
  /** Rejects with ConflictError when the id is taken. */
  createDocument(document: Document): Promise<void>;
  getDocument(documentId: string): Promise<Document | null>;
  listDocuments(): Promise<Document[]>;
  updateDocument(documentId: string, patch: DocumentPatch): Promise<Document>;
  deleteDocument(documentId: string): Promise<void>;

  /** Replaces every chunk of the document, dropping their checkpoints. */
  saveChunks(documentId: string, chunks: Chunk[]): Promise<void>;
  listChunks(documentId: string): Promise<StoredChunk[]>;
  saveEmbeddings(documentId: string, embeddings: Map<string, number[]>): Promise<void>;
  markIndexed(documentId: string, chunkIds: string[]): Promise<void>;
  clearChunks(documentId: string): Promise<void>;
}
