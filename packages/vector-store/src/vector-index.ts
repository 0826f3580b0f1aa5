import type { IndexedRecord, RetrievalHit } from "@groundwork/types";
import { SchemaMismatchError } from "@groundwork/errors";
import type { CollectionSchema, IVectorStore, VectorFilter } from "./vector-store.interface.js";

/** Extra hits requested from the driver so ties at the k-th place order deterministically. */
export const TIE_SLACK = 16;

/**
 * One collection with a fixed schema on top of a driver.
 *
 * The collection is created on first use. Vectors whose width differs from
 * the schema, and existing collections with a different width, raise
 * {@link SchemaMismatchError}. Records are written hidden and become
 * searchable once their document is published.
 */
export class VectorIndex {
  private ready: Promise<void> | null = null;

  constructor(
    private readonly store: IVectorStore,
    readonly schema: CollectionSchema,
  ) {}

  get backend(): string {
    return this.store.name;
  }

  ensureCollection(): Promise<void> {
    if (!this.ready) {
      this.ready = this.prepare().catch((err: unknown) => {
        this.ready = null;
        throw err;
      });
    }
    return this.ready;
  }

  async upsert(records: IndexedRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    for (const record of records) {
      this.assertWidth(record.vector.length, `record ${record.id}`);
    }
    await this.ensureCollection();
    await this.store.upsert(this.schema.name, records, false);
  }

  async publishDocument(documentId: string): Promise<void> {
    await this.ensureCollection();
    await this.store.setVisibility(this.schema.name, documentId, true);
  }

  async search(vector: number[], k: number, filter?: VectorFilter): Promise<RetrievalHit[]> {
    this.assertWidth(vector.length, "query vector");
    if (k <= 0) {
      return [];
    }
    await this.ensureCollection();

    const results = await this.store.search(this.schema.name, {
      vector,
      limit: k + TIE_SLACK,
      filter,
    });

    return results
      .sort(
        (a, b) =>
          b.score - a.score ||
          a.payload.chunkIndex - b.payload.chunkIndex ||
          a.payload.documentId.localeCompare(b.payload.documentId),
      )
      .slice(0, k)
      .map(({ id, score, payload }) => {
        const { visible: _visible, ...record } = payload;
        return { record: { ...record, id }, score };
      });
  }

  async deleteDocument(documentId: string): Promise<void> {
    await this.ensureCollection();
    await this.store.deleteByDocument(this.schema.name, documentId);
  }

  async count(documentId?: string): Promise<number> {
    await this.ensureCollection();
    return this.store.count(this.schema.name, documentId === undefined ? {} : { documentId });
  }

  healthCheck(): Promise<boolean> {
    return this.store.healthCheck();
  }

  private async prepare(): Promise<void> {
    const info = await this.store.collectionInfo(this.schema.name);
    if (info) {
      this.assertCollectionWidth(info.dimensions);
      return;
    }
    try {
      await this.store.createCollection(this.schema);
    } catch (err: unknown) {
      // Another process may have created it between the lookup and the create
      const created = await this.store.collectionInfo(this.schema.name);
      if (!created) {
        throw err;
      }
      this.assertCollectionWidth(created.dimensions);
    }
  }

  private assertCollectionWidth(dimensions: number): void {
    if (dimensions !== this.schema.dimensions) {
      throw new SchemaMismatchError(
        `Collection "${this.schema.name}" holds ${dimensions}-dimensional vectors, expected ${this.schema.dimensions}`,
        this.schema.dimensions,
        dimensions,
      );
    }
  }

  private assertWidth(width: number, what: string): void {
    if (width !== this.schema.dimensions) {
      throw new SchemaMismatchError(
        `${what} has ${width} dimensions, collection "${this.schema.name}" expects ${this.schema.dimensions}`,
        this.schema.dimensions,
        width,
      );
    }
  }
}
