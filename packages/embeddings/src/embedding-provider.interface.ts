import type { EmbeddingResult } from "@groundwork/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;
  /** Largest number of inputs the provider accepts in one request. */
  readonly maxBatchSize: number;

  embedQuery(text: string, signal?: AbortSignal): Promise<number[]>;
  embedDocuments(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
