import type { IndexedRecord } from "@groundwork/types";
import { NotFoundError } from "@groundwork/errors";
import type {
  CollectionInfo,
  CollectionSchema,
  CountFilter,
  IVectorStore,
  StoredPayload,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
import { toStoredPayload } from "./payload.js";

interface StoredPoint {
  id: string;
  vector: number[];
  payload: StoredPayload;
}

interface MemoryCollection {
  schema: CollectionSchema;
  points: Map<string, StoredPoint>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Exact cosine search over an in-process map. Single process only; used in
 * development and tests.
 */
export class InMemoryVectorStore implements IVectorStore {
  readonly name = "memory";
  private collections = new Map<string, MemoryCollection>();

  async collectionInfo(collection: string): Promise<CollectionInfo | null> {
    const found = this.collections.get(collection);
    if (!found) {
      return null;
    }
    return {
      name: collection,
      dimensions: found.schema.dimensions,
      pointCount: found.points.size,
    };
  }

  async createCollection(schema: CollectionSchema): Promise<void> {
    if (!this.collections.has(schema.name)) {
      this.collections.set(schema.name, { schema, points: new Map() });
    }
  }

  async upsert(collection: string, records: IndexedRecord[], visible: boolean): Promise<void> {
    const points = this.require(collection).points;
    for (const record of records) {
      points.set(record.id, {
        id: record.id,
        vector: [...record.vector],
        payload: toStoredPayload(record, visible),
      });
    }
  }

  async setVisibility(collection: string, documentId: string, visible: boolean): Promise<void> {
    for (const point of this.require(collection).points.values()) {
      if (point.payload.documentId === documentId) {
        point.payload = { ...point.payload, visible };
      }
    }
  }

  async search(collection: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const documentIds = params.filter?.documentIds;
    const scoped = documentIds && documentIds.length > 0 ? new Set(documentIds) : null;

    const results: VectorSearchResult[] = [];
    for (const point of this.require(collection).points.values()) {
      if (!point.payload.visible) continue;
      if (scoped && !scoped.has(point.payload.documentId)) continue;
      results.push({
        id: point.id,
        score: cosineSimilarity(params.vector, point.vector),
        payload: { ...point.payload },
      });
    }

    results.sort((a, b) => b.score - a.score);
    return results.slice(0, params.limit);
  }

  async deleteByDocument(collection: string, documentId: string): Promise<void> {
    const points = this.require(collection).points;
    for (const [id, point] of points) {
      if (point.payload.documentId === documentId) {
        points.delete(id);
      }
    }
  }

  async count(collection: string, filter?: CountFilter): Promise<number> {
    let total = 0;
    for (const point of this.require(collection).points.values()) {
      if (filter?.documentId !== undefined && point.payload.documentId !== filter.documentId) {
        continue;
      }
      if (filter?.visible !== undefined && point.payload.visible !== filter.visible) {
        continue;
      }
      total++;
    }
    return total;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private require(collection: string): MemoryCollection {
    const found = this.collections.get(collection);
    if (!found) {
      throw new NotFoundError(`Collection "${collection}" does not exist`);
    }
    return found;
  }
}
