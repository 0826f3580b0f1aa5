import type { IndexedRecordPayload } from "./pipeline.js";

export interface QueryRequest {
  question: string;
  k?: number;
  documentIds?: string[];
  timeoutMs?: number;
}

export interface RetrievalHit {
  record: IndexedRecordPayload & { id: string };
  score: number;
}

export interface RetrievalResult {
  question: string;
  hits: RetrievalHit[];
  retrievalTimeMs: number;
}

export interface Citation {
  documentId: string;
  chunkId: string;
  chunkIndex: number;
  score: number;
}

export interface Answer {
  text: string;
  citations: Citation[];
  grounded: boolean;
  confidence?: number;
  latencyMs: number;
  model?: string;
}

export type QueryErrorKind = "generation_failed" | "misconfigured";

export interface QueryError {
  code: string;
  message: string;
  retryable: boolean;
}

export type QueryResponse =
  | { kind: "answered"; answer: string; citations: Citation[]; confidence?: number; latencyMs: number }
  | { kind: "no_grounding"; answer: string; citations: []; latencyMs: number }
  | { kind: "generation_failed"; citations: Citation[]; error: QueryError; latencyMs: number }
  | { kind: "misconfigured"; citations: []; error: QueryError; latencyMs: number };
