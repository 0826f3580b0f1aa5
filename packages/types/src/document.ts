export type WorkflowState =
  | "received"
  | "splitting"
  | "embedding"
  | "indexing"
  | "completed"
  | "failed";

export type WorkflowStep = "splitting" | "embedding" | "indexing";

export type DocumentStatus = "pending" | "chunking" | "embedding" | "indexed" | "failed";

export const DOCUMENT_STATUS_BY_STATE: Readonly<Record<WorkflowState, DocumentStatus>> = {
  received: "pending",
  splitting: "chunking",
  embedding: "embedding",
  indexing: "embedding",
  completed: "indexed",
  failed: "failed",
};

export type DocumentSource = { type: "file"; path: string } | { type: "inline"; content: string };

export interface DocumentFailure {
  step: WorkflowStep;
  code: string;
  message: string;
}

export interface Document {
  id: string;
  filename: string;
  mimeType: string;
  source: DocumentSource;
  state: WorkflowState;
  chunkCount: number;
  failure: DocumentFailure | null;
  uploadedAt: Date;
  updatedAt: Date;
}

export interface DocumentUploadRequest {
  documentId?: string;
  filename: string;
  path?: string;
  content?: string;
  mimeType?: string;
}

export interface DocumentStatusView {
  documentId: string;
  filename: string;
  state: WorkflowState;
  status: DocumentStatus;
  chunkCount: number;
  failure: DocumentFailure | null;
  uploadedAt: Date;
  updatedAt: Date;
}
