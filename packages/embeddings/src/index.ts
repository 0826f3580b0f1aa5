export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { OpenAIEmbeddingProvider } from "./openai-provider.js";
export type { OpenAIProviderConfig } from "./openai-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export { EmbeddingClient } from "./embedding-client.js";
export type { EmbeddingClientOptions, EmbedOptions } from "./embedding-client.js";
