import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@groundwork/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

type CohereInputType = "search_document" | "search_query";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  readonly maxBatchSize = BATCH_SIZE;
  private client: CohereClient;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const result = await this.request([text], "search_query", signal);
    return result.embeddings[0] ?? [];
  }

  async embedDocuments(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    return this.request(texts, "search_document", signal);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embedQuery("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async request(
    texts: string[],
    inputType: CohereInputType,
    signal?: AbortSignal,
  ): Promise<EmbeddingResult> {
    const response = await this.client.v2.embed(
      {
        texts,
        model: this.model,
        inputType,
        embeddingTypes: ["float"],
      },
      { abortSignal: signal, maxRetries: 0 },
    );

    return {
      embeddings: response.embeddings.float ?? [],
      model: this.model,
      // Use actual tokensUsed from Cohere response for billing accuracy
      tokensUsed: response.meta?.billedUnits?.inputTokens ?? 0,
      dimensions: this.dimensions,
    };
  }
}
