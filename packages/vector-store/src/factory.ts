import type { VectorStoreSettings } from "@groundwork/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { InMemoryVectorStore } from "./in-memory-store.js";

export function createVectorStore(config: Omit<VectorStoreSettings, "collection">): IVectorStore {
  switch (config.type) {
    case "qdrant":
      if (!config.url) {
        throw new Error("url is required for Qdrant vector store");
      }
      return new QdrantVectorStore(config.url, config.apiKey);
    case "memory":
      return new InMemoryVectorStore();
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
