export type {
  IVectorStore,
  CollectionSchema,
  CollectionInfo,
  CountFilter,
  DistanceMetric,
  StoredPayload,
  VectorFilter,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export { InMemoryVectorStore, cosineSimilarity } from "./in-memory-store.js";
export { VectorIndex, TIE_SLACK } from "./vector-index.js";
export { createVectorStore } from "./factory.js";
