import type { EmbeddingConfig } from "@groundwork/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";

export function createEmbeddingProvider(
  config: Pick<EmbeddingConfig, "provider" | "apiKey"> &
    Partial<Pick<EmbeddingConfig, "model" | "dimensions">>,
): IEmbeddingProvider {
  if (!config.apiKey) {
    throw new Error(`API key is required for embedding provider '${config.provider}'`);
  }

  const options = { apiKey: config.apiKey, model: config.model, dimensions: config.dimensions };

  switch (config.provider) {
    case "openai":
      return new OpenAIEmbeddingProvider(options);
    case "cohere":
      return new CohereEmbeddingProvider(options);
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
