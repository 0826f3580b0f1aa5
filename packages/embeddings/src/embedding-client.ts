import {
  EmbeddingError,
  SchemaMismatchError,
  errorMessage,
  withRetry,
} from "@groundwork/errors";
import type { RetryAttempt, RetryOptions } from "@groundwork/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export interface EmbeddingClientOptions {
  /** Upper bound on inputs per request; the provider's own limit still applies. Default: 64 */
  batchSize?: number;
  retry?: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;
  onRetry?: (info: RetryAttempt & { offset: number }) => void;
}

export interface EmbedOptions {
  /** Called after each batch succeeds, in input order. */
  onBatch?: (offset: number, vectors: number[][]) => Promise<void> | void;
  signal?: AbortSignal;
}

const DEFAULT_BATCH_SIZE = 64;

/**
 * Batches, retries and validates calls to an embedding provider.
 *
 * A failing batch is retried on its own; batches that already succeeded have
 * been handed to `onBatch` and are not requested again. Responses with the
 * wrong vector count or width raise {@link SchemaMismatchError}, which is never
 * retried.
 */
export class EmbeddingClient {
  readonly batchSize: number;

  constructor(
    private readonly provider: IEmbeddingProvider,
    private readonly options: EmbeddingClientOptions = {},
  ) {
    this.batchSize = Math.max(
      1,
      Math.min(options.batchSize ?? DEFAULT_BATCH_SIZE, provider.maxBatchSize),
    );
  }

  get name(): string {
    return this.provider.name;
  }

  get model(): string {
    return this.provider.model;
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  async embed(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    const vectors: number[][] = [];

    for (let offset = 0; offset < texts.length; offset += this.batchSize) {
      const batch = texts.slice(offset, offset + this.batchSize);
      const batchVectors = await this.call(offset, batch.length, options.signal, async () => {
        const result = await this.provider.embedDocuments(batch, options.signal);
        return this.validate(result.embeddings, batch.length);
      });
      await options.onBatch?.(offset, batchVectors);
      vectors.push(...batchVectors);
    }

    return vectors;
  }

  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.call(0, 1, signal, async () => {
      const queryVector = await this.provider.embedQuery(text, signal);
      return this.validate([queryVector], 1);
    });
    return vector ?? [];
  }

  healthCheck(): Promise<boolean> {
    return this.provider.healthCheck();
  }

  private async call(
    offset: number,
    size: number,
    signal: AbortSignal | undefined,
    fn: () => Promise<number[][]>,
  ): Promise<number[][]> {
    try {
      return await withRetry(fn, {
        ...this.options.retry,
        signal,
        onRetry: (info) => this.options.onRetry?.({ ...info, offset }),
      });
    } catch (err: unknown) {
      if (err instanceof SchemaMismatchError) {
        throw err;
      }
      throw new EmbeddingError(
        `Embedding batch at offset ${offset} failed: ${errorMessage(err)}`,
        this.provider.name,
        { cause: err, details: { offset, size } },
      );
    }
  }

  private validate(vectors: number[][], expectedCount: number): number[][] {
    if (vectors.length !== expectedCount) {
      throw new SchemaMismatchError(
        `${this.provider.name} returned ${vectors.length} vectors for ${expectedCount} inputs`,
        expectedCount,
        vectors.length,
      );
    }
    for (const vector of vectors) {
      if (vector.length !== this.provider.dimensions) {
        throw new SchemaMismatchError(
          `${this.provider.model} returned ${vector.length}-dimensional vectors, expected ${this.provider.dimensions}`,
          this.provider.dimensions,
          vector.length,
        );
      }
    }
    return vectors;
  }
}
