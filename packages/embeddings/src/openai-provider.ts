import OpenAI from "openai";
import type { EmbeddingResult } from "@groundwork/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "text-embedding-3-large";
const DEFAULT_DIMENSIONS = 3072;
const BATCH_SIZE = 2048; // OpenAI input array limit

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly model: string;
  readonly dimensions: number;
  readonly maxBatchSize = BATCH_SIZE;
  private client: OpenAI;

  constructor(config: OpenAIProviderConfig) {
    // Retries are owned by EmbeddingClient
    this.client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const result = await this.embedDocuments([text], signal);
    return result.embeddings[0] ?? [];
  }

  async embedDocuments(texts: string[], signal?: AbortSignal): Promise<EmbeddingResult> {
    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: texts,
        // Only the text-embedding-3 family can shorten its vectors
        ...(this.model.startsWith("text-embedding-3") ? { dimensions: this.dimensions } : {}),
      },
      { signal },
    );

    const ordered = [...response.data].sort((a, b) => a.index - b.index);

    return {
      embeddings: ordered.map((d) => d.embedding),
      model: response.model,
      tokensUsed: response.usage.prompt_tokens,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embedQuery("health check");
      return true;
    } catch {
      return false;
    }
  }
}
