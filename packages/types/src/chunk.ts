export type ChunkStrategy = "sentence" | "fixed";

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  maxTokens: number;
  overlap: number;
}

/** A chunk as produced by a chunker, before it is bound to a document. */
export interface ChunkResult {
  content: string;
  index: number;
  tokenCount: number;
  metadata: ChunkSpan;
}

export interface ChunkSpan {
  tokenStart: number;
  tokenEnd: number;
  startChar: number;
  endChar: number;
  /** Tokens shared with the previous chunk. */
  overlap: number;
}

export interface Chunk {
  id: string;
  documentId: string;
  index: number;
  content: string;
  tokenCount: number;
  span: ChunkSpan;
}
