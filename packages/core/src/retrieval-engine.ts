import type { RetrievalResult } from "@groundwork/types";
import type { EmbeddingClient } from "@groundwork/embeddings";
import type { VectorIndex } from "@groundwork/vector-store";
import { createSilentLogger } from "@groundwork/logger";
import type { Logger } from "@groundwork/logger";
import { parseInput, retrievalRequestSchema } from "./validation.js";

export interface RetrievalEngineDependencies {
  embeddings: EmbeddingClient;
  index: VectorIndex;
  /** k when the request names none. */
  defaultK: number;
  logger?: Logger;
}

/**
 * Retrieval: Query -> Embed -> Vector Search
 *
 * The query is embedded with the client used at ingestion; a vector whose
 * width differs from the collection raises SchemaMismatchError. An empty
 * collection yields an empty result, and fewer than k records yields them all.
 */
export class RetrievalEngine {
  private readonly logger: Logger;

  constructor(private readonly deps: RetrievalEngineDependencies) {
    this.logger = deps.logger ?? createSilentLogger();
  }

  get defaultK(): number {
    return this.deps.defaultK;
  }

  async retrieve(input: unknown, signal?: AbortSignal): Promise<RetrievalResult> {
    const startTime = Date.now();
    const request = parseInput(retrievalRequestSchema, input);
    const k = request.k ?? this.deps.defaultK;

    const vector = await this.deps.embeddings.embedQuery(request.question, signal);
    const hits = await this.deps.index.search(
      vector,
      k,
      request.documentIds ? { documentIds: request.documentIds } : undefined,
    );

    const retrievalTimeMs = Date.now() - startTime;
    this.logger.debug({ k, hits: hits.length, retrievalTimeMs }, "Retrieved context");

    return { question: request.question, hits, retrievalTimeMs };
  }
}
