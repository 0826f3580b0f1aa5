import type { ChunkStrategy } from "./chunk.js";

export type EmbeddingProviderType = "openai" | "cohere";

export type VectorStoreType = "qdrant" | "memory";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  uploadDir: string;
  embedding: EmbeddingConfig;
  generation: GenerationConfig;
  chunking: ChunkingSettings;
  vectorStore: VectorStoreSettings;
  retrieval: RetrievalConfig;
  database: DatabaseConfig | null;
  redis: RedisConfig | null;
  worker: WorkerConfig;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  model: string;
  dimensions: number;
  batchSize: number;
  apiKey: string;
}

export interface GenerationConfig {
  model: string;
  maxTokens: number;
  temperature: number;
  apiKey: string;
}

export interface ChunkingSettings {
  strategy: ChunkStrategy;
  chunkSize: number;
  overlap: number;
}

export interface VectorStoreSettings {
  type: VectorStoreType;
  url: string;
  apiKey?: string;
  collection: string;
}

export interface RetrievalConfig {
  topK: number;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface WorkerConfig {
  concurrency: number;
}
