import type { IndexedRecord, IndexedRecordPayload } from "@groundwork/types";

export type DistanceMetric = "Cosine";

export interface CollectionSchema {
  name: string;
  dimensions: number;
  distance: DistanceMetric;
}

export interface CollectionInfo {
  name: string;
  dimensions: number;
  pointCount: number;
}

export interface VectorFilter {
  documentIds?: string[];
}

export interface VectorSearchParams {
  vector: number[];
  limit: number;
  filter?: VectorFilter;
}

/** Payload as stored: the record fields plus the publication flag. */
export interface StoredPayload extends IndexedRecordPayload {
  visible: boolean;
}

export interface VectorSearchResult {
  id: string;
  score: number;
  payload: StoredPayload;
}

export interface CountFilter {
  documentId?: string;
  visible?: boolean;
}

/**
 * Backend driver. Searches only ever return visible records; the
 * {@link VectorIndex} owns schema checks and result ordering.
 */
export interface IVectorStore {
  readonly name: string;

  collectionInfo(collection: string): Promise<CollectionInfo | null>;
  createCollection(schema: CollectionSchema): Promise<void>;
  /** Insert or replace by id. */
  upsert(collection: string, records: IndexedRecord[], visible: boolean): Promise<void>;
  setVisibility(collection: string, documentId: string, visible: boolean): Promise<void>;
  search(collection: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  deleteByDocument(collection: string, documentId: string): Promise<void>;
  count(collection: string, filter?: CountFilter): Promise<number>;
  healthCheck(): Promise<boolean>;
}
