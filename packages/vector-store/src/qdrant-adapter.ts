import { QdrantClient } from "@qdrant/js-client-rest";
import type { Schemas } from "@qdrant/js-client-rest";
import type { IndexedRecord } from "@groundwork/types";
import { SchemaMismatchError } from "@groundwork/errors";
import type {
  CollectionInfo,
  CollectionSchema,
  CountFilter,
  IVectorStore,
  VectorFilter,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
import { storedPayloadSchema, toStoredPayload } from "./payload.js";

const BATCH_SIZE = 100;

type Condition = Schemas["Condition"];

function documentCondition(documentIds: string[]): Condition {
  return documentIds.length === 1
    ? { key: "documentId", match: { value: documentIds[0] ?? "" } }
    : { key: "documentId", match: { any: documentIds } };
}

export class QdrantVectorStore implements IVectorStore {
  readonly name = "qdrant";
  private client: QdrantClient;

  constructor(url: string, apiKey?: string) {
    // Skip the server version probe the client fires on construction
    this.client = new QdrantClient({ url, apiKey, checkCompatibility: false });
  }

  async collectionInfo(collection: string): Promise<CollectionInfo | null> {
    const { exists } = await this.client.collectionExists(collection);
    if (!exists) {
      return null;
    }

    const info = await this.client.getCollection(collection);
    const vectors = info.config.params.vectors;
    const size = vectors && "size" in vectors ? vectors.size : undefined;
    if (typeof size !== "number") {
      // Named vectors are never created by this adapter
      throw new SchemaMismatchError(
        `Collection "${collection}" does not hold a single unnamed vector`,
        1,
        0,
      );
    }

    return { name: collection, dimensions: size, pointCount: info.points_count ?? 0 };
  }

  async createCollection(schema: CollectionSchema): Promise<void> {
    await this.client.createCollection(schema.name, {
      vectors: {
        size: schema.dimensions,
        distance: schema.distance,
      },
      optimizers_config: {
        indexing_threshold: 20000,
      },
    });

    // Create payload indexes for filtering
    await this.client.createPayloadIndex(schema.name, {
      field_name: "documentId",
      field_schema: "keyword",
    });
    await this.client.createPayloadIndex(schema.name, {
      field_name: "visible",
      field_schema: "bool",
    });
  }

  async upsert(collection: string, records: IndexedRecord[], visible: boolean): Promise<void> {
    // Process in batches
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      await this.client.upsert(collection, {
        wait: true,
        points: batch.map((r) => ({
          id: r.id,
          vector: r.vector,
          payload: { ...toStoredPayload(r, visible) },
        })),
      });
    }
  }

  async setVisibility(collection: string, documentId: string, visible: boolean): Promise<void> {
    await this.client.setPayload(collection, {
      wait: true,
      payload: { visible },
      filter: { must: [documentCondition([documentId])] },
    });
  }

  async search(collection: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const results = await this.client.search(collection, {
      vector: params.vector,
      limit: params.limit,
      filter: this.searchFilter(params.filter),
      with_payload: true,
    });

    return results.map((r) => ({
      id: typeof r.id === "string" ? r.id : String(r.id),
      score: r.score,
      payload: storedPayloadSchema.parse(r.payload ?? {}),
    }));
  }

  async deleteByDocument(collection: string, documentId: string): Promise<void> {
    await this.client.delete(collection, {
      wait: true,
      filter: { must: [documentCondition([documentId])] },
    });
  }

  async count(collection: string, filter?: CountFilter): Promise<number> {
    const must: Condition[] = [];
    if (filter?.documentId !== undefined) {
      must.push(documentCondition([filter.documentId]));
    }
    if (filter?.visible !== undefined) {
      must.push({ key: "visible", match: { value: filter.visible } });
    }

    const result = await this.client.count(collection, {
      exact: true,
      ...(must.length > 0 ? { filter: { must } } : {}),
    });
    return result.count;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private searchFilter(filter?: VectorFilter): Schemas["Filter"] {
    const must: Condition[] = [{ key: "visible", match: { value: true } }];

    if (filter?.documentIds && filter.documentIds.length > 0) {
      must.push(documentCondition(filter.documentIds));
    }

    return { must };
  }
}
